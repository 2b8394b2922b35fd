/**
 * Tagged JSON form of a field, as read and written by the command-line tool.
 *
 *   null                                  Null
 *   {"UInt64": "18446744073709551615"}    64-bit integers as decimal strings
 *   {"Float64": 1.5} / {"Float64": "inf"}
 *   {"Decimal64": "1.50"}                 scale = digits after the point
 *   {"UInt128": "<uuid text>"}
 *   {"AggregateFunctionState": {"name": "sum(UInt64)", "data": "<hex>"}}
 */

import { applyVisitor, type FieldVisitor } from "./dispatch.ts";
import { formatDecimal, parseDecimal } from "./decimal.ts";
import { FieldError } from "./errors.ts";
import { formatFloat } from "./to_string.ts";
import { Field, type DecimalKind } from "./types.ts";
import { uuidToString } from "./uuid.ts";

export type FieldJSON =
  | null
  | { UInt64: string }
  | { Int64: string }
  | { Float64: number | string }
  | { String: string }
  | { Array: FieldJSON[] }
  | { Tuple: FieldJSON[] }
  | { UInt128: string }
  | { Decimal32: string }
  | { Decimal64: string }
  | { Decimal128: string }
  | { AggregateFunctionState: { name: string; data: string } };

const toJSONVisitor: FieldVisitor<FieldJSON> = {
  Null: () => null,
  UInt64: (f) => ({ UInt64: f.value.toString() }),
  Int64: (f) => ({ Int64: f.value.toString() }),
  // JSON has no inf/nan and drops the sign of zero
  Float64: (f) => ({
    Float64: Number.isFinite(f.value) && !Object.is(f.value, -0) ? f.value : formatFloat(f.value),
  }),
  String: (f) => ({ String: f.value }),
  Array: (f) => ({ Array: f.value.map(fieldToJSON) }),
  Tuple: (f) => ({ Tuple: f.value.map(fieldToJSON) }),
  UInt128: (f) => ({ UInt128: uuidToString(f.value) }),
  Decimal32: (f) => ({ Decimal32: formatDecimal(f.value, f.scale) }),
  Decimal64: (f) => ({ Decimal64: formatDecimal(f.value, f.scale) }),
  Decimal128: (f) => ({ Decimal128: formatDecimal(f.value, f.scale) }),
  AggregateFunctionState: (f) => ({
    AggregateFunctionState: { name: f.name, data: Buffer.from(f.data).toString("hex") },
  }),
};

export function fieldToJSON(field: Field): FieldJSON {
  return applyVisitor(toJSONVisitor, field);
}

// --- Parsing ---

function invalid(message: string): never {
  throw new FieldError("CANNOT_PARSE_INPUT", message);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function expectString(tag: string, v: unknown): string {
  if (typeof v !== "string") invalid(`${tag} expects a string, got ${JSON.stringify(v)}`);
  return v;
}

function expectList(tag: string, v: unknown): Field[] {
  if (!Array.isArray(v)) invalid(`${tag} expects a list, got ${JSON.stringify(v)}`);
  return v.map(fieldFromJSON);
}

function parseInteger(tag: string, v: unknown): bigint {
  const s = expectString(tag, v);
  if (!/^-?\d+$/.test(s)) invalid(`${tag} expects an integer string, got "${s}"`);
  return BigInt(s);
}

function parseFloatValue(v: unknown): number {
  if (typeof v === "number") return v;
  switch (v) {
    case "inf": return Infinity;
    case "-inf": return -Infinity;
    case "nan": return NaN;
    case "-0": return -0;
  }
  return invalid(`Float64 expects a number, "inf", "-inf" or "nan", got ${JSON.stringify(v)}`);
}

function parseDecimalValue(kind: DecimalKind, v: unknown): Field {
  const text = expectString(kind, v);
  const parsed = parseDecimal(text);
  if (parsed === null) invalid(`${kind} expects decimal text, got "${text}"`);
  return Field[kind](parsed.value, parsed.scale);
}

function parseAggregateState(v: unknown): Field {
  if (!isRecord(v)) invalid(`AggregateFunctionState expects {name, data}, got ${JSON.stringify(v)}`);
  const name = expectString("AggregateFunctionState.name", v.name);
  const data = expectString("AggregateFunctionState.data", v.data);
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(data)) invalid(`AggregateFunctionState.data expects hex, got "${data}"`);
  return Field.AggregateFunctionState(name, new Uint8Array(Buffer.from(data, "hex")));
}

function build(tag: string, v: unknown): Field {
  switch (tag) {
    case "UInt64": return Field.UInt64(parseInteger(tag, v));
    case "Int64": return Field.Int64(parseInteger(tag, v));
    case "Float64": return Field.Float64(parseFloatValue(v));
    case "String": return Field.String(expectString(tag, v));
    case "Array": return Field.Array(...expectList(tag, v));
    case "Tuple": return Field.Tuple(...expectList(tag, v));
    case "UInt128": return Field.UUID(expectString(tag, v));
    case "Decimal32":
    case "Decimal64":
    case "Decimal128":
      return parseDecimalValue(tag, v);
    case "AggregateFunctionState": return parseAggregateState(v);
    default: return invalid(`Unknown field kind "${tag}"`);
  }
}

/** Parse the tagged form. Malformed input fails with CANNOT_PARSE_INPUT. */
export function fieldFromJSON(json: unknown): Field {
  if (json === null) return Field.Null;
  if (!isRecord(json)) invalid(`Expected null or a tagged object, got ${JSON.stringify(json)}`);
  const keys = Object.keys(json);
  if (keys.length !== 1) invalid(`Expected exactly one kind tag, got ${keys.length}`);
  const tag = keys[0];
  try {
    return build(tag, json[tag]);
  } catch (err) {
    // builders reject out-of-range values with RangeError/TypeError
    if (err instanceof RangeError || err instanceof TypeError) invalid(err.message);
    throw err;
  }
}
