/**
 * Accurate comparison of fields of possibly different kinds.
 *
 * Unlike plain same-kind comparison this orders UInt64/Int64/Float64 by their
 * mathematical value, aligns decimal scales, and treats UUID text and UInt128
 * as the same thing. The rules match those of the comparison functions in
 * query evaluation, so index analysis and expression results agree.
 *
 * Incomparable pairs: equality answers false, ordering throws BAD_TYPE_OF_FIELD.
 * Decimal vs Float64 is the exception: equality throws in both orders, and
 * Float64 < Decimal answers false while Decimal < Float64 throws.
 */

import {
  applyBinaryVisitor,
  decimalBranches,
  type BinaryFieldVisitor,
  type FieldVisitor,
  type PartialFieldVisitor,
} from "./dispatch.ts";
import { compareDecimals, integerAsDecimal } from "./decimal.ts";
import { FieldError } from "./errors.ts";
import { equalsOp, lessOp } from "./numeric.ts";
import type { DecimalField, Field } from "./types.ts";
import { stringToUUID } from "./uuid.ts";

function cannotCompare(l: Field, r: Field): never {
  throw new FieldError("BAD_TYPE_OF_FIELD", `Cannot compare ${l.kind} with ${r.kind}`);
}

/** Code point order, which is the byte order of the UTF-8 encodings. */
export function compareStrings(a: string, b: string): -1 | 0 | 1 {
  const x = a[Symbol.iterator]();
  const y = b[Symbol.iterator]();
  for (;;) {
    const cx = x.next();
    const cy = y.next();
    if (cx.done || cy.done) {
      if (cx.done && cy.done) return 0;
      return cx.done ? -1 : 1;
    }
    const px = cx.value.codePointAt(0) ?? 0;
    const py = cy.value.codePointAt(0) ?? 0;
    if (px !== py) return px < py ? -1 : 1;
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

// --- Equality ---

function sequenceEquals(a: readonly Field[], b: readonly Field[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!accurateEquals(a[i], b[i])) return false;
  }
  return true;
}

/** Not equal to Null nor to any kind not named. */
function equalsBranches(branches: Partial<FieldVisitor<boolean>>): PartialFieldVisitor<boolean> {
  return { Null: () => false, ...branches, otherwise: () => false };
}

function decimalEqualsWith(l: DecimalField): PartialFieldVisitor<boolean> {
  return equalsBranches({
    ...decimalBranches((r) => compareDecimals(l, r) === 0),
    UInt64: (r) => compareDecimals(l, integerAsDecimal(r.value)) === 0,
    Int64: (r) => compareDecimals(l, integerAsDecimal(r.value)) === 0,
    Float64: (r) => cannotCompare(l, r),
  });
}

const equalsVisitor: BinaryFieldVisitor<boolean> = {
  Null: () => ({ Null: () => true, otherwise: () => false }),
  UInt64: (l) =>
    equalsBranches({
      UInt64: (r) => l.value === r.value,
      Int64: (r) => equalsOp(l.value, r.value),
      Float64: (r) => equalsOp(l.value, r.value),
      ...decimalBranches((r) => compareDecimals(integerAsDecimal(l.value), r) === 0),
    }),
  Int64: (l) =>
    equalsBranches({
      UInt64: (r) => equalsOp(l.value, r.value),
      Int64: (r) => l.value === r.value,
      Float64: (r) => equalsOp(l.value, r.value),
      ...decimalBranches((r) => compareDecimals(integerAsDecimal(l.value), r) === 0),
    }),
  Float64: (l) =>
    equalsBranches({
      UInt64: (r) => equalsOp(l.value, r.value),
      Int64: (r) => equalsOp(l.value, r.value),
      Float64: (r) => l.value === r.value,
      ...decimalBranches((r) => cannotCompare(l, r)),
    }),
  String: (l) =>
    equalsBranches({
      String: (r) => l.value === r.value,
      UInt128: (r) => stringToUUID(l.value) === r.value,
    }),
  UInt128: (l) =>
    equalsBranches({
      UInt128: (r) => l.value === r.value,
      String: (r) => l.value === stringToUUID(r.value),
    }),
  Array: (l) => equalsBranches({ Array: (r) => sequenceEquals(l.value, r.value) }),
  Tuple: (l) => equalsBranches({ Tuple: (r) => sequenceEquals(l.value, r.value) }),
  Decimal32: decimalEqualsWith,
  Decimal64: decimalEqualsWith,
  Decimal128: decimalEqualsWith,
  AggregateFunctionState: (l) =>
    equalsBranches({
      AggregateFunctionState: (r) => l.name === r.name && bytesEqual(l.data, r.data),
    }),
};

export function accurateEquals(left: Field, right: Field): boolean {
  return applyBinaryVisitor(equalsVisitor, left, right);
}

// --- Ordering ---

/** Lexicographic; a proper prefix sorts first. */
function sequenceLess(a: readonly Field[], b: readonly Field[]): boolean {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (accurateLess(a[i], b[i])) return true;
    if (accurateLess(b[i], a[i])) return false;
  }
  return a.length < b.length;
}

/** Null sorts first, so nothing is less than Null; any other kind not named throws. */
function lessBranches(l: Field, branches: Partial<FieldVisitor<boolean>>): PartialFieldVisitor<boolean> {
  return { Null: () => false, ...branches, otherwise: (r) => cannotCompare(l, r) };
}

function decimalLessWith(l: DecimalField): PartialFieldVisitor<boolean> {
  return lessBranches(l, {
    ...decimalBranches((r) => compareDecimals(l, r) < 0),
    UInt64: (r) => compareDecimals(l, integerAsDecimal(r.value)) < 0,
    Int64: (r) => compareDecimals(l, integerAsDecimal(r.value)) < 0,
  });
}

const lessVisitor: BinaryFieldVisitor<boolean> = {
  Null: () => ({ Null: () => false, otherwise: () => true }),
  UInt64: (l) =>
    lessBranches(l, {
      UInt64: (r) => l.value < r.value,
      Int64: (r) => lessOp(l.value, r.value),
      Float64: (r) => lessOp(l.value, r.value),
      ...decimalBranches((r) => compareDecimals(integerAsDecimal(l.value), r) < 0),
    }),
  Int64: (l) =>
    lessBranches(l, {
      UInt64: (r) => lessOp(l.value, r.value),
      Int64: (r) => l.value < r.value,
      Float64: (r) => lessOp(l.value, r.value),
      ...decimalBranches((r) => compareDecimals(integerAsDecimal(l.value), r) < 0),
    }),
  Float64: (l) =>
    lessBranches(l, {
      UInt64: (r) => lessOp(l.value, r.value),
      Int64: (r) => lessOp(l.value, r.value),
      Float64: (r) => l.value < r.value,
      // only this order has a default; Decimal < Float64 throws
      ...decimalBranches(() => false),
    }),
  String: (l) =>
    lessBranches(l, {
      String: (r) => compareStrings(l.value, r.value) < 0,
      UInt128: (r) => stringToUUID(l.value) < r.value,
    }),
  UInt128: (l) =>
    lessBranches(l, {
      UInt128: (r) => l.value < r.value,
      String: (r) => l.value < stringToUUID(r.value),
    }),
  Array: (l) => lessBranches(l, { Array: (r) => sequenceLess(l.value, r.value) }),
  Tuple: (l) => lessBranches(l, { Tuple: (r) => sequenceLess(l.value, r.value) }),
  Decimal32: decimalLessWith,
  Decimal64: decimalLessWith,
  Decimal128: decimalLessWith,
  // never ordered, not even against Null
  AggregateFunctionState: (l) => ({ otherwise: (r) => cannotCompare(l, r) }),
};

export function accurateLess(left: Field, right: Field): boolean {
  return applyBinaryVisitor(lessVisitor, left, right);
}

// --- Strict identity ---

const identityVisitor: BinaryFieldVisitor<boolean> = {
  Null: () => ({ Null: () => true, otherwise: () => false }),
  UInt64: (l) => ({ UInt64: (r) => l.value === r.value, otherwise: () => false }),
  Int64: (l) => ({ Int64: (r) => l.value === r.value, otherwise: () => false }),
  Float64: (l) => ({ Float64: (r) => Object.is(l.value, r.value), otherwise: () => false }),
  String: (l) => ({ String: (r) => l.value === r.value, otherwise: () => false }),
  Array: (l) => ({ Array: (r) => sequenceIdentical(l.value, r.value), otherwise: () => false }),
  Tuple: (l) => ({ Tuple: (r) => sequenceIdentical(l.value, r.value), otherwise: () => false }),
  UInt128: (l) => ({ UInt128: (r) => l.value === r.value, otherwise: () => false }),
  Decimal32: (l) => ({ Decimal32: (r) => l.value === r.value && l.scale === r.scale, otherwise: () => false }),
  Decimal64: (l) => ({ Decimal64: (r) => l.value === r.value && l.scale === r.scale, otherwise: () => false }),
  Decimal128: (l) => ({ Decimal128: (r) => l.value === r.value && l.scale === r.scale, otherwise: () => false }),
  AggregateFunctionState: (l) => ({
    AggregateFunctionState: (r) => l.name === r.name && bytesEqual(l.data, r.data),
    otherwise: () => false,
  }),
};

function sequenceIdentical(a: readonly Field[], b: readonly Field[]): boolean {
  return a.length === b.length && a.every((item, i) => fieldEquals(item, b[i]));
}

/**
 * Same kind and same content; decimals must also share the scale. This is the
 * equality hashField is consistent with.
 */
export function fieldEquals(left: Field, right: Field): boolean {
  return applyBinaryVisitor(identityVisitor, left, right);
}
