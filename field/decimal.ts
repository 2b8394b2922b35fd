/**
 * Fixed-point helpers: scale multipliers, scale alignment and decimal text.
 */

import type { DecimalField, DecimalKind } from "./types.ts";
import { DecimalSpec } from "./types.ts";

export interface ScaledValue {
  value: bigint;
  scale: number;
}

export function scaleMultiplier(scale: number): bigint {
  return 10n ** BigInt(scale);
}

/** A whole number as a zero-scale Decimal128, the widest representation. */
export function integerAsDecimal(value: bigint): DecimalField<"Decimal128"> {
  return { kind: "Decimal128", value, scale: 0 };
}

/** Bring both magnitudes to the larger scale. bigint arithmetic, so nothing overflows. */
export function alignScales(a: ScaledValue, b: ScaledValue): [bigint, bigint] {
  if (a.scale === b.scale) return [a.value, b.value];
  if (a.scale < b.scale) return [a.value * scaleMultiplier(b.scale - a.scale), b.value];
  return [a.value, b.value * scaleMultiplier(a.scale - b.scale)];
}

export function compareDecimals(a: ScaledValue, b: ScaledValue): -1 | 0 | 1 {
  const [x, y] = alignScales(a, b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/** Wrap a magnitude into the width of a decimal kind. */
export function wrapDecimal(value: bigint, kind: DecimalKind): bigint {
  return BigInt.asIntN(DecimalSpec[kind].bits, value);
}

/** Render `value / 10^scale` with exactly `scale` fractional digits. */
export function formatDecimal(value: bigint, scale: number): string {
  const neg = value < 0n;
  let str = (neg ? -value : value).toString();
  if (scale === 0) return neg ? "-" + str : str;
  while (str.length <= scale) str = "0" + str;
  const r = str.slice(0, -scale) + "." + str.slice(-scale);
  return neg ? "-" + r : r;
}

/** Parse "-12.340" into magnitude -12340, scale 3. Returns null for malformed text. */
export function parseDecimal(text: string): ScaledValue | null {
  const m = /^(-?)(\d+)(?:\.(\d+))?$/.exec(text.trim());
  if (!m) return null;
  const frac = m[3] ?? "";
  const value = BigInt(m[2] + frac);
  return { value: m[1] === "-" ? -value : value, scale: frac.length };
}

/** Magnitude at scale `from` brought to scale `to`; narrowing truncates toward zero. */
export function rescale(value: bigint, from: number, to: number): bigint {
  if (from === to) return value;
  if (from < to) return value * scaleMultiplier(to - from);
  return value / scaleMultiplier(from - to);
}

/** `value / 10^scale` as the nearest double. */
export function scaledToFloat(value: bigint, scale: number): number {
  return Number(value) / Number(scaleMultiplier(scale));
}

/**
 * Magnitude at `scale` nearest to a finite float, ties away from zero.
 * Null for non-finite input.
 */
export function floatToScaled(f: number, scale: number): bigint | null {
  if (!Number.isFinite(f)) return null;
  let numerator = f;
  let exponent = 0n;
  while (!Number.isInteger(numerator)) {
    numerator *= 2;
    exponent++;
  }
  // f = numerator / 2^exponent, exactly
  const scaled = BigInt(numerator) * scaleMultiplier(scale);
  if (exponent === 0n) return scaled;
  const divisor = 1n << exponent;
  const quotient = scaled / divisor;
  const remainder = scaled % divisor;
  if ((remainder < 0n ? -remainder : remainder) * 2n < divisor) return quotient;
  return scaled < 0n ? quotient - 1n : quotient + 1n;
}

// --- Decimal targets ---

/** A decimal representation to convert or cast into: a width and a scale. */
export interface DecimalTarget<K extends DecimalKind = DecimalKind> {
  kind: K;
  scale: number;
}

/** Throws RangeError for a scale the width cannot hold, as the builders do. */
export function checkDecimalTarget(target: DecimalTarget): void {
  const { maxScale } = DecimalSpec[target.kind];
  if (!Number.isInteger(target.scale) || target.scale < 0 || target.scale > maxScale) {
    throw new RangeError(`${target.kind} scale out of range: ${target.scale} not in [0, ${maxScale}]`);
  }
}

/** "Decimal64(2)" */
export function decimalTargetName(target: DecimalTarget): string {
  return `${target.kind}(${target.scale})`;
}
