/**
 * Renders a field as a literal in query text.
 */

import { applyVisitor, decimalBranches, type FieldVisitor } from "./dispatch.ts";
import { formatDecimal } from "./decimal.ts";
import { quoteBytes, quoteString } from "./quote.ts";
import type { Field } from "./types.ts";
import { uuidToString } from "./uuid.ts";

export function formatFloat(x: number): string {
  if (Number.isNaN(x)) return "nan";
  if (x === Infinity) return "inf";
  if (x === -Infinity) return "-inf";
  if (Object.is(x, -0)) return "-0";
  return String(x);
}

function join(items: readonly Field[]): string {
  return items.map(fieldToString).join(", ");
}

const toStringVisitor: FieldVisitor<string> = {
  Null: () => "NULL",
  UInt64: (f) => f.value.toString(),
  Int64: (f) => f.value.toString(),
  Float64: (f) => formatFloat(f.value),
  String: (f) => quoteString(f.value),
  Array: (f) => `[${join(f.value)}]`,
  // "(x)" would read back as a parenthesized scalar
  Tuple: (f) => (f.value.length > 1 ? `(${join(f.value)})` : `tuple(${join(f.value)})`),
  UInt128: (f) => quoteString(uuidToString(f.value)),
  ...decimalBranches((f) => formatDecimal(f.value, f.scale)),
  AggregateFunctionState: (f) => quoteBytes(f.data),
};

export function fieldToString(field: Field): string {
  return applyVisitor(toStringVisitor, field);
}
