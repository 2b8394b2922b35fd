/**
 * Readable, unambiguous text dump of a field's kind and value, for diagnostics.
 */

import { applyVisitor, type FieldVisitor } from "./dispatch.ts";
import { quoteBytes, quoteString } from "./quote.ts";
import { formatFloat } from "./to_string.ts";
import type { DecimalField, Field } from "./types.ts";

const LOW_64 = (1n << 64n) - 1n;

function dumpDecimal(f: DecimalField): string {
  return `${f.kind}_(${f.value}, ${f.scale})`;
}

function join(items: readonly Field[]): string {
  return items.map(fieldDump).join(", ");
}

const dumpVisitor: FieldVisitor<string> = {
  Null: () => "NULL",
  UInt64: (f) => `UInt64_${f.value}`,
  Int64: (f) => `Int64_${f.value}`,
  Float64: (f) => `Float64_${formatFloat(f.value)}`,
  String: (f) => quoteString(f.value),
  Array: (f) => `Array_[${join(f.value)}]`,
  Tuple: (f) => `Tuple_(${join(f.value)})`,
  UInt128: (f) => `UInt128_${f.value & LOW_64}_${f.value >> 64n}`,
  Decimal32: dumpDecimal,
  Decimal64: dumpDecimal,
  Decimal128: dumpDecimal,
  AggregateFunctionState: (f) => `AggregateFunctionState_(${quoteString(f.name)}, ${quoteBytes(f.data)})`,
};

export function fieldDump(field: Field): string {
  return applyVisitor(dumpVisitor, field);
}
