/**
 * Result-returning forms of the fallible operators, for callers that prefer
 * checking a value over catching FieldError.
 */

import { castField } from "./cast.ts";
import { accurateEquals, accurateLess } from "./compare.ts";
import { convertToNumber } from "./convert.ts";
import type { DecimalTarget } from "./decimal.ts";
import { attempt, type Result } from "./errors.ts";
import type { CastType, Numeric, NumericType } from "./numeric.ts";
import { sumField } from "./sum.ts";
import type { DecimalField, Field } from "./types.ts";

export const tryConvertToNumber = (field: Field, type: NumericType | DecimalTarget): Result<Numeric | DecimalField> =>
  attempt(() => convertToNumber(field, type));

export const tryAccurateEquals = (left: Field, right: Field): Result<boolean> =>
  attempt(() => accurateEquals(left, right));

export const tryAccurateLess = (left: Field, right: Field): Result<boolean> =>
  attempt(() => accurateLess(left, right));

/** Same in-place semantics as sumField; target is untouched on failure. */
export const trySumField = (target: Field, rhs: Field): Result<boolean> =>
  attempt(() => sumField(target, rhs));

export const tryCastField = (field: Field, type: CastType | DecimalTarget): Result<Numeric | DecimalField> =>
  attempt(() => castField(field, type));
