/**
 * One operator invocation over JSON-tagged fields, as issued by the CLI.
 *
 *   {"op": "less", "args": [{"UInt64": "1"}, {"Float64": 1.5}]}
 *   {"op": "cast", "type": "UInt32", "args": [{"Int64": "-1"}]}
 *   {"op": "cast", "type": "Decimal64(2)", "args": [{"Float64": 0.1}]}
 */

import { castField } from "./cast.ts";
import { accurateEquals, accurateLess, fieldEquals } from "./compare.ts";
import { convertToNumber } from "./convert.ts";
import { checkDecimalTarget, formatDecimal, type DecimalTarget } from "./decimal.ts";
import { fieldDump } from "./dump.ts";
import { FieldError } from "./errors.ts";
import { fieldHash, type HashAccumulatorOptions } from "./hash.ts";
import { fieldFromJSON, fieldToJSON, type FieldJSON } from "./json.ts";
import { IntegerSpec, type CastType, type NumericType } from "./numeric.ts";
import { sumField } from "./sum.ts";
import { fieldToString } from "./to_string.ts";
import type { DecimalField, Field } from "./types.ts";

export const OPS = ["toString", "dump", "hash", "convert", "cast", "equals", "less", "identical", "sum"] as const;

export type Op = (typeof OPS)[number];

export interface Command {
  op: Op;
  args: Field[];
  type?: CastType | DecimalTarget;
}

export type CommandResult = string | boolean | number | { nonzero: boolean; value: FieldJSON };

export interface CommandOptions {
  hash?: HashAccumulatorOptions;
}

function invalid(message: string): never {
  throw new FieldError("CANNOT_PARSE_INPUT", message);
}

function isOp(v: unknown): v is Op {
  return OPS.some((op) => op === v);
}

function isCastType(v: unknown): v is CastType {
  return v === "Float32" || v === "Float64" || Object.keys(IntegerSpec).some((t) => t === v);
}

const DECIMAL_TARGET = /^(Decimal32|Decimal64|Decimal128)\((\d+)\)$/;

function parseTargetType(v: unknown): CastType | DecimalTarget {
  if (isCastType(v)) return v;
  const m = typeof v === "string" ? DECIMAL_TARGET.exec(v) : null;
  if (!m) invalid(`Unknown numeric type ${JSON.stringify(v)}`);
  const kind = m[1];
  const scale = Number(m[2]);
  switch (kind) {
    case "Decimal32":
    case "Decimal64":
    case "Decimal128": {
      const target: DecimalTarget = { kind, scale };
      try {
        checkDecimalTarget(target);
      } catch (err) {
        if (err instanceof RangeError) invalid(err.message);
        throw err;
      }
      return target;
    }
  }
  return invalid(`Unknown numeric type ${JSON.stringify(v)}`);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function parseCommand(json: unknown): Command {
  if (!isRecord(json)) invalid(`Expected a command object, got ${JSON.stringify(json)}`);
  const { op, args, type } = json;
  if (!isOp(op)) invalid(`Unknown op ${JSON.stringify(op)}; expected one of ${OPS.join(", ")}`);
  if (!Array.isArray(args)) invalid(`"args" must be a list of fields`);
  const target = type === undefined ? undefined : parseTargetType(type);
  return { op, args: args.map(fieldFromJSON), type: target };
}

function arity(cmd: Command, n: number): Field[] {
  if (cmd.args.length !== n) invalid(`${cmd.op} takes ${n} field(s), got ${cmd.args.length}`);
  return cmd.args;
}

function targetType(cmd: Command): CastType | DecimalTarget {
  if (cmd.type === undefined) invalid(`${cmd.op} needs a "type"`);
  return cmd.type;
}

function numericType(cmd: Command): NumericType | DecimalTarget {
  const type = targetType(cmd);
  if (type === "UInt128") invalid(`${cmd.op} cannot target UInt128`);
  return type;
}

/** Numbers stay numbers; 64/128-bit integers and decimals come back as decimal strings. */
function numericResult(v: bigint | number | DecimalField): string | number {
  if (typeof v === "bigint") return v.toString();
  if (typeof v === "number") return v;
  return formatDecimal(v.value, v.scale);
}

export function evaluateCommand(cmd: Command, options: CommandOptions = {}): CommandResult {
  switch (cmd.op) {
    case "toString": return fieldToString(arity(cmd, 1)[0]);
    case "dump": return fieldDump(arity(cmd, 1)[0]);
    case "hash": return fieldHash(arity(cmd, 1)[0], options.hash);
    case "convert": return numericResult(convertToNumber(arity(cmd, 1)[0], numericType(cmd)));
    case "cast": return numericResult(castField(arity(cmd, 1)[0], targetType(cmd)));
    case "equals": {
      const [l, r] = arity(cmd, 2);
      return accurateEquals(l, r);
    }
    case "less": {
      const [l, r] = arity(cmd, 2);
      return accurateLess(l, r);
    }
    case "identical": {
      const [l, r] = arity(cmd, 2);
      return fieldEquals(l, r);
    }
    case "sum": {
      const [target, rhs] = arity(cmd, 2);
      const nonzero = sumField(target, rhs);
      return { nonzero, value: fieldToJSON(target) };
    }
  }
}
