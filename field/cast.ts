/**
 * castField(): static cast of a field to a numeric representation, with a
 * precision check. Converting the result back to the source representation must
 * reproduce the source value, so truncation, overflow and rounding are all
 * reported.
 *
 * Two failure tiers: TYPE_MISMATCH when the source kind has no conversion path
 * to the target at all, VALUE_IS_OUT_OF_RANGE_OF_DATA_TYPE when this particular
 * value does not survive the cast.
 */

import { applyVisitor, decimalBranches, type FieldVisitor } from "./dispatch.ts";
import {
  checkDecimalTarget,
  compareDecimals,
  decimalTargetName,
  floatToScaled,
  integerAsDecimal,
  rescale,
  scaleMultiplier,
  scaledToFloat,
  wrapDecimal,
  type DecimalTarget,
} from "./decimal.ts";
import { FieldError } from "./errors.ts";
import {
  equalsOp,
  integerResult,
  isFloatType,
  toFloat,
  truncateFloat,
  wrapInteger,
  type BigIntType,
  type CastType,
  type Numeric,
  type NumberType,
} from "./numeric.ts";
import { fieldToString } from "./to_string.ts";
import type { DecimalField, DecimalKind, Field, Int64Field, UInt128Field, UInt64Field } from "./types.ts";

function typeMismatch(kind: string, type: string): never {
  throw new FieldError("TYPE_MISMATCH", `Cannot cast Field value of type '${kind}' to '${type}'`);
}

function outOfRange(field: Field, kind: string, type: string): never {
  throw new FieldError(
    "VALUE_IS_OUT_OF_RANGE_OF_DATA_TYPE",
    `Cannot cast Field value '${fieldToString(field)}' of type '${kind}' to '${type}'`,
  );
}

function noPath<R>(type: string) {
  return {
    Null: (): R => typeMismatch("Null", type),
    String: (): R => typeMismatch("String", type),
    Array: (): R => typeMismatch("Array", type),
    Tuple: (): R => typeMismatch("Tuple", type),
    AggregateFunctionState: (): R => typeMismatch("AggregateFunctionStateData", type),
  };
}

function caster(type: CastType): FieldVisitor<Numeric> {
  const fromInteger = (field: UInt64Field | Int64Field | UInt128Field): Numeric => {
    const v = field.value;
    if (isFloatType(type)) {
      const dest = toFloat(v, type);
      if (!equalsOp(dest, v)) outOfRange(field, field.kind, type);
      return dest;
    }
    const dest = wrapInteger(v, type);
    if (dest !== v) outOfRange(field, field.kind, type);
    return integerResult(dest, type);
  };

  const fromDecimal = (field: DecimalField): Numeric => {
    if (type === "UInt128") typeMismatch(field.kind, type);
    if (isFloatType(type)) {
      const dest = toFloat(scaledToFloat(field.value, field.scale), type);
      // back at the source scale; infinity has no decimal value
      if (floatToScaled(dest, field.scale) !== field.value) outOfRange(field, field.kind, type);
      return dest;
    }
    const dest = wrapInteger(field.value / scaleMultiplier(field.scale), type);
    if (compareDecimals(integerAsDecimal(dest), field) !== 0) outOfRange(field, field.kind, type);
    return integerResult(dest, type);
  };

  return {
    ...noPath<Numeric>(type),
    UInt64: fromInteger,
    Int64: fromInteger,
    UInt128: fromInteger,
    Float64: (field) => {
      if (type === "UInt128") typeMismatch("Float64", type);
      const v = field.value;
      if (isFloatType(type)) {
        const dest = toFloat(v, type);
        // NaN has an exact NaN counterpart in every float type
        if (dest !== v && !(Number.isNaN(dest) && Number.isNaN(v))) outOfRange(field, "Float64", type);
        return dest;
      }
      const truncated = truncateFloat(v);
      if (truncated === null) outOfRange(field, "Float64", type);
      const dest = wrapInteger(truncated, type);
      if (!equalsOp(dest, v)) outOfRange(field, "Float64", type);
      return integerResult(dest, type);
    },
    ...decimalBranches(fromDecimal),
  };
}

/** Magnitude at the target scale; the decimal it denotes must equal the source. */
function decimalCaster(target: DecimalTarget): FieldVisitor<bigint> {
  const name = decimalTargetName(target);

  const fromInteger = (field: UInt64Field | Int64Field | UInt128Field): bigint => {
    const exact = rescale(field.value, 0, target.scale);
    const dest = wrapDecimal(exact, target.kind);
    if (dest !== exact) outOfRange(field, field.kind, name);
    return dest;
  };

  return {
    ...noPath<bigint>(name),
    UInt64: fromInteger,
    Int64: fromInteger,
    UInt128: fromInteger,
    Float64: (field) => {
      const scaled = floatToScaled(field.value, target.scale);
      if (scaled === null) outOfRange(field, "Float64", name);
      const dest = wrapDecimal(scaled, target.kind);
      if (scaledToFloat(dest, target.scale) !== field.value) outOfRange(field, "Float64", name);
      return dest;
    },
    ...decimalBranches((field) => {
      const dest = wrapDecimal(rescale(field.value, field.scale, target.scale), target.kind);
      if (compareDecimals({ value: dest, scale: target.scale }, field) !== 0) outOfRange(field, field.kind, name);
      return dest;
    }),
  };
}

export function castField(field: Field, type: BigIntType | "UInt128"): bigint;
export function castField(field: Field, type: NumberType): number;
export function castField<K extends DecimalKind>(field: Field, type: DecimalTarget<K>): DecimalField<K>;
export function castField(field: Field, type: CastType): Numeric;
export function castField(field: Field, type: CastType | DecimalTarget): Numeric | DecimalField;
export function castField(field: Field, type: CastType | DecimalTarget): Numeric | DecimalField {
  if (typeof type === "string") return applyVisitor(caster(type), field);
  checkDecimalTarget(type);
  return { kind: type.kind, value: applyVisitor(decimalCaster(type), field), scale: type.scale };
}
