/**
 * In-place `+=` on a numeric field.
 *
 * This is the one operator that mutates its argument: accumulators add into an
 * existing field rather than allocate a new one per row. Returns false when the
 * result is zero, so callers can drop zero-valued entries.
 */

import { applyPartialVisitor, applyVisitor, type FieldVisitor } from "./dispatch.ts";
import { wrapDecimal } from "./decimal.ts";
import { FieldError } from "./errors.ts";
import type { DecimalField, DecimalKind, Field, FieldKind } from "./types.ts";

function cannotSum(what: string): never {
  throw new FieldError("LOGICAL_ERROR", `Cannot sum ${what}`);
}

/** rhs must have exactly the accumulator's kind; callers convert beforehand. */
function badGet(requested: FieldKind): (f: Field) => never {
  return (f) => {
    throw new FieldError("BAD_GET", `Bad get: has ${f.kind}, requested ${requested}`);
  };
}

function sumDecimal<K extends DecimalKind>(x: DecimalField<K>, y: DecimalField<K>): boolean {
  if (x.scale !== y.scale) {
    throw new FieldError("LOGICAL_ERROR", `Cannot add decimals of different scales: ${x.scale} and ${y.scale}`);
  }
  x.value = wrapDecimal(x.value + y.value, x.kind);
  return x.value !== 0n;
}

function summer(rhs: Field): FieldVisitor<boolean> {
  return {
    UInt64: (x) => {
      const y = applyPartialVisitor<bigint>({ UInt64: (r) => r.value, otherwise: badGet("UInt64") }, rhs);
      x.value = BigInt.asUintN(64, x.value + y);
      return x.value !== 0n;
    },
    Int64: (x) => {
      const y = applyPartialVisitor<bigint>({ Int64: (r) => r.value, otherwise: badGet("Int64") }, rhs);
      x.value = BigInt.asIntN(64, x.value + y);
      return x.value !== 0n;
    },
    Float64: (x) => {
      x.value += applyPartialVisitor<number>({ Float64: (r) => r.value, otherwise: badGet("Float64") }, rhs);
      return x.value !== 0;
    },
    Decimal32: (x) =>
      sumDecimal(x, applyPartialVisitor<DecimalField<"Decimal32">>({ Decimal32: (r) => r, otherwise: badGet("Decimal32") }, rhs)),
    Decimal64: (x) =>
      sumDecimal(x, applyPartialVisitor<DecimalField<"Decimal64">>({ Decimal64: (r) => r, otherwise: badGet("Decimal64") }, rhs)),
    Decimal128: (x) =>
      sumDecimal(x, applyPartialVisitor<DecimalField<"Decimal128">>({ Decimal128: (r) => r, otherwise: badGet("Decimal128") }, rhs)),
    Null: () => cannotSum("Nulls"),
    String: () => cannotSum("Strings"),
    Array: () => cannotSum("Arrays"),
    Tuple: () => cannotSum("Tuples"),
    UInt128: () => cannotSum("UUIDs"),
    AggregateFunctionState: () => cannotSum("AggregateFunctionStates"),
  };
}

/** `target += rhs`, in place. Returns whether the result is nonzero. */
export function sumField(target: Field, rhs: Field): boolean {
  return applyVisitor(summer(rhs), target);
}
