/**
 * Closed set of numeric representations that fields convert and cast to,
 * with static-cast semantics and exact mixed integer/float comparison.
 */

export type BigIntType = "UInt64" | "Int64";
export type NumberType = "UInt8" | "UInt16" | "UInt32" | "Int8" | "Int16" | "Int32" | "Float32" | "Float64";
export type NumericType = BigIntType | NumberType;
export type FloatType = "Float32" | "Float64";

/** Cast targets: the numeric representations plus the raw 128-bit integer. */
export type CastType = NumericType | "UInt128";

export type IntegerType = Exclude<CastType, FloatType>;

/** Either side of a mixed comparison: integers as bigint, floats as number. */
export type Numeric = bigint | number;

export const IntegerSpec = {
  UInt8: { bits: 8, signed: false },
  UInt16: { bits: 16, signed: false },
  UInt32: { bits: 32, signed: false },
  UInt64: { bits: 64, signed: false },
  UInt128: { bits: 128, signed: false },
  Int8: { bits: 8, signed: true },
  Int16: { bits: 16, signed: true },
  Int32: { bits: 32, signed: true },
  Int64: { bits: 64, signed: true },
} as const satisfies Record<IntegerType, { bits: number; signed: boolean }>;

export function isFloatType(type: CastType): type is FloatType {
  return type === "Float32" || type === "Float64";
}

export function isBigIntType(type: CastType): type is BigIntType | "UInt128" {
  return type === "UInt64" || type === "Int64" || type === "UInt128";
}

// --- Static casts ---

/** Two's-complement wrap into the target width, like a C cast between integer types. */
export function wrapInteger(v: bigint, type: IntegerType): bigint {
  const { bits, signed } = IntegerSpec[type];
  return signed ? BigInt.asIntN(bits, v) : BigInt.asUintN(bits, v);
}

/** Truncate toward zero. Non-finite input has no integer value. */
export function truncateFloat(v: number): bigint | null {
  if (!Number.isFinite(v)) return null;
  return BigInt(Math.trunc(v));
}

/** Round to the nearest value of the float type. */
export function toFloat(v: Numeric, type: FloatType): number {
  const n = Number(v);
  return type === "Float32" ? Math.fround(n) : n;
}

/** Integer result in the JS type its representation maps to. */
export function integerResult(v: bigint, type: IntegerType): Numeric {
  return isBigIntType(type) ? v : Number(v);
}

// --- Exact comparison ---

/**
 * Three-way comparison of mathematical values, mixing bigint and number without
 * rounding either side. Returns NaN when the pair is unordered (a NaN operand).
 */
export function compareNumeric(a: Numeric, b: Numeric): number {
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "number" && typeof b === "number") {
    if (a < b) return -1;
    if (a > b) return 1;
    return a === b ? 0 : NaN;
  }
  if (typeof a === "number" && typeof b === "bigint") {
    return compareFloatWithInteger(a, b);
  }
  const r = compareNumeric(b, a);
  return r === 0 ? 0 : -r;
}

function compareFloatWithInteger(f: number, i: bigint): number {
  if (Number.isNaN(f)) return NaN;
  if (f === Infinity) return 1;
  if (f === -Infinity) return -1;
  // f lies in [floor, floor + 1)
  const floor = Math.floor(f);
  const floorInt = BigInt(floor);
  if (floorInt < i) return -1;
  if (floorInt > i) return 1;
  return f === floor ? 0 : 1;
}

export function equalsOp(a: Numeric, b: Numeric): boolean {
  return compareNumeric(a, b) === 0;
}

export function lessOp(a: Numeric, b: Numeric): boolean {
  return compareNumeric(a, b) < 0;
}
