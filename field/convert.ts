/**
 * Converts a numeric field of any kind to a requested numeric representation.
 *
 * Static-cast semantics: integers wrap into the target width, floats truncate
 * toward zero, precision loss is accepted. Use castField for a checked cast.
 */

import { applyVisitor, decimalBranches, type FieldVisitor } from "./dispatch.ts";
import {
  checkDecimalTarget,
  decimalTargetName,
  floatToScaled,
  rescale,
  scaleMultiplier,
  scaledToFloat,
  wrapDecimal,
  type DecimalTarget,
} from "./decimal.ts";
import { FieldError } from "./errors.ts";
import {
  integerResult,
  isFloatType,
  toFloat,
  truncateFloat,
  wrapInteger,
  type BigIntType,
  type Numeric,
  type NumberType,
  type NumericType,
} from "./numeric.ts";
import type { DecimalField, DecimalKind, Field } from "./types.ts";

function cannotConvert(from: string, type: string): never {
  throw new FieldError("CANNOT_CONVERT_TYPE", `Cannot convert ${from} to ${type}`);
}

function integerToNumeric(v: bigint, type: NumericType): Numeric {
  return isFloatType(type) ? toFloat(v, type) : integerResult(wrapInteger(v, type), type);
}

function floatToNumeric(v: number, type: NumericType): Numeric {
  if (isFloatType(type)) return toFloat(v, type);
  const truncated = truncateFloat(v);
  if (truncated === null) cannotConvert(`Float64 value ${v}`, type);
  return integerResult(wrapInteger(truncated, type), type);
}

/** Visitor of the kinds that never convert; `name` is the target as shown in messages. */
function nonNumeric<R>(name: string) {
  return {
    Null: (): R => cannotConvert("NULL", name),
    String: (): R => cannotConvert("String", name),
    Array: (): R => cannotConvert("Array", name),
    Tuple: (): R => cannotConvert("Tuple", name),
    UInt128: (): R => cannotConvert("UInt128", name),
    AggregateFunctionState: (): R => cannotConvert("AggregateFunctionStateData", name),
  };
}

function converter(type: NumericType): FieldVisitor<Numeric> {
  return {
    ...nonNumeric<Numeric>(type),
    UInt64: (f) => integerToNumeric(f.value, type),
    Int64: (f) => integerToNumeric(f.value, type),
    Float64: (f) => floatToNumeric(f.value, type),
    ...decimalBranches((f) =>
      isFloatType(type)
        ? toFloat(scaledToFloat(f.value, f.scale), type)
        : integerToNumeric(f.value / scaleMultiplier(f.scale), type),
    ),
  };
}

/** Magnitude at the target scale, wrapped into the target width. */
function decimalConverter(target: DecimalTarget): FieldVisitor<bigint> {
  const name = decimalTargetName(target);
  const wrap = (v: bigint) => wrapDecimal(v, target.kind);
  return {
    ...nonNumeric<bigint>(name),
    UInt64: (f) => wrap(rescale(f.value, 0, target.scale)),
    Int64: (f) => wrap(rescale(f.value, 0, target.scale)),
    Float64: (f) => {
      const scaled = floatToScaled(f.value, target.scale);
      if (scaled === null) cannotConvert(`Float64 value ${f.value}`, name);
      return wrap(scaled);
    },
    ...decimalBranches((f) => wrap(rescale(f.value, f.scale, target.scale))),
  };
}

export function convertToNumber(field: Field, type: BigIntType): bigint;
export function convertToNumber(field: Field, type: NumberType): number;
export function convertToNumber<K extends DecimalKind>(field: Field, type: DecimalTarget<K>): DecimalField<K>;
export function convertToNumber(field: Field, type: NumericType): Numeric;
export function convertToNumber(field: Field, type: NumericType | DecimalTarget): Numeric | DecimalField;
export function convertToNumber(field: Field, type: NumericType | DecimalTarget): Numeric | DecimalField {
  if (typeof type === "string") return applyVisitor(converter(type), field);
  checkDecimalTarget(type);
  return { kind: type.kind, value: applyVisitor(decimalConverter(type), field), scale: type.scale };
}
