/**
 * The Field value type: a closed, dynamically-tagged union used for literals,
 * column elements and intermediate results whose type is only known at run time.
 */

import { parseUUID } from "./uuid.ts";

// --- Range constants ---

export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;
export const UINT64_MAX = (1n << 64n) - 1n;
export const INT128_MIN = -(1n << 127n);
export const INT128_MAX = (1n << 127n) - 1n;
export const UINT128_MAX = (1n << 128n) - 1n;

// --- Kinds ---

export interface NullField {
  readonly kind: "Null";
}

export interface UInt64Field {
  readonly kind: "UInt64";
  value: bigint;
}

export interface Int64Field {
  readonly kind: "Int64";
  value: bigint;
}

export interface Float64Field {
  readonly kind: "Float64";
  value: number;
}

export interface StringField {
  readonly kind: "String";
  readonly value: string;
}

export interface ArrayField {
  readonly kind: "Array";
  readonly value: readonly Field[];
}

export interface TupleField {
  readonly kind: "Tuple";
  readonly value: readonly Field[];
}

/** 128-bit unsigned integer; also the storage of a UUID (big-endian bytes in text order). */
export interface UInt128Field {
  readonly kind: "UInt128";
  readonly value: bigint;
}

export type DecimalKind = "Decimal32" | "Decimal64" | "Decimal128";

/** Fixed-point number: `value / 10^scale`. */
export interface DecimalField<K extends DecimalKind = DecimalKind> {
  readonly kind: K;
  value: bigint;
  readonly scale: number;
}

export interface AggregateFunctionStateField {
  readonly kind: "AggregateFunctionState";
  /** Identity of the aggregate function that produced the state, e.g. "sum(UInt64)". */
  readonly name: string;
  readonly data: Uint8Array;
}

export type Field =
  | NullField
  | UInt64Field
  | Int64Field
  | Float64Field
  | StringField
  | ArrayField
  | TupleField
  | UInt128Field
  | DecimalField<"Decimal32">
  | DecimalField<"Decimal64">
  | DecimalField<"Decimal128">
  | AggregateFunctionStateField;

export type FieldKind = Field["kind"];

export type FieldOf<K extends FieldKind> = Extract<Field, { kind: K }>;

/** Stable per-kind codes; the hash visitor feeds these as the type tag. */
export const FieldTypeCode = {
  Null: 0,
  UInt64: 1,
  Int64: 2,
  Float64: 3,
  UInt128: 4,
  String: 16,
  Array: 17,
  Tuple: 18,
  Decimal32: 19,
  Decimal64: 20,
  Decimal128: 21,
  AggregateFunctionState: 22,
} as const satisfies Record<FieldKind, number>;

export const DecimalSpec = {
  Decimal32: { bits: 32, maxScale: 9 },
  Decimal64: { bits: 64, maxScale: 18 },
  Decimal128: { bits: 128, maxScale: 38 },
} as const satisfies Record<DecimalKind, { bits: number; maxScale: number }>;

// --- Construction ---

function toBigIntInRange(v: bigint | number, typeName: string, min: bigint, max: bigint): bigint {
  let b: bigint;
  if (typeof v === "number") {
    if (!Number.isFinite(v)) {
      throw new TypeError(`Cannot coerce number "${v}" to ${typeName}`);
    }
    if (!Number.isInteger(v)) {
      throw new TypeError(`Cannot coerce number "${v}" to ${typeName} (expected integer)`);
    }
    if (!Number.isSafeInteger(v)) {
      throw new RangeError(`${typeName} cannot safely represent number "${v}". Use bigint.`);
    }
    b = BigInt(v);
  } else {
    b = v;
  }
  if (b < min || b > max) {
    throw new RangeError(`${typeName} out of range: ${b} not in [${min}, ${max}]`);
  }
  return b;
}

function decimal<K extends DecimalKind>(kind: K, v: bigint | number, scale: number): DecimalField<K> {
  const { bits, maxScale } = DecimalSpec[kind];
  if (!Number.isInteger(scale) || scale < 0 || scale > maxScale) {
    throw new RangeError(`${kind} scale out of range: ${scale} not in [0, ${maxScale}]`);
  }
  const limit = 1n << BigInt(bits - 1);
  return { kind, value: toBigIntInRange(v, kind, -limit, limit - 1n), scale };
}

const NULL: NullField = Object.freeze({ kind: "Null" });

/**
 * Builders for every kind. Range violations throw RangeError, malformed
 * arguments TypeError.
 */
export const Field = {
  Null: NULL,

  UInt64: (v: bigint | number): UInt64Field => ({
    kind: "UInt64",
    value: toBigIntInRange(v, "UInt64", 0n, UINT64_MAX),
  }),

  Int64: (v: bigint | number): Int64Field => ({
    kind: "Int64",
    value: toBigIntInRange(v, "Int64", INT64_MIN, INT64_MAX),
  }),

  Float64: (v: number): Float64Field => ({ kind: "Float64", value: v }),

  String: (v: string): StringField => ({ kind: "String", value: v }),

  Array: (...items: Field[]): ArrayField => ({ kind: "Array", value: items }),

  Tuple: (...items: Field[]): TupleField => ({ kind: "Tuple", value: items }),

  UInt128: (v: bigint | number): UInt128Field => ({
    kind: "UInt128",
    value: toBigIntInRange(v, "UInt128", 0n, UINT128_MAX),
  }),

  /** UUID text to a UInt128 field. Accepts the hyphenated or the bare 32-digit form. */
  UUID: (text: string): UInt128Field => {
    const value = parseUUID(text);
    if (value === null) {
      throw new TypeError(`Invalid UUID: "${text}"`);
    }
    return { kind: "UInt128", value };
  },

  Decimal32: (v: bigint | number, scale: number) => decimal("Decimal32", v, scale),
  Decimal64: (v: bigint | number, scale: number) => decimal("Decimal64", v, scale),
  Decimal128: (v: bigint | number, scale: number) => decimal("Decimal128", v, scale),

  AggregateFunctionState: (name: string, data: Uint8Array): AggregateFunctionStateField => ({
    kind: "AggregateFunctionState",
    name,
    data,
  }),
} as const;
