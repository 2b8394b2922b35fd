export {
  Field,
  FieldTypeCode,
  DecimalSpec,
  INT64_MIN,
  INT64_MAX,
  UINT64_MAX,
  INT128_MIN,
  INT128_MAX,
  UINT128_MAX,
  type FieldKind,
  type FieldOf,
  type DecimalKind,
  type NullField,
  type UInt64Field,
  type Int64Field,
  type Float64Field,
  type StringField,
  type ArrayField,
  type TupleField,
  type UInt128Field,
  type DecimalField,
  type AggregateFunctionStateField,
} from "./field/types.ts";
export {
  applyVisitor,
  applyPartialVisitor,
  applyBinaryVisitor,
  completeVisitor,
  decimalBranches,
  type FieldVisitor,
  type PartialFieldVisitor,
  type BinaryFieldVisitor,
} from "./field/dispatch.ts";
export { FieldError, ErrorCodes, attempt, type ErrorCodeName, type Result } from "./field/errors.ts";
export type { BigIntType, NumberType, NumericType, CastType, Numeric } from "./field/numeric.ts";
export { fieldToString } from "./field/to_string.ts";
export { fieldDump } from "./field/dump.ts";
export { convertToNumber } from "./field/convert.ts";
export {
  hashField,
  fieldHash,
  createHashAccumulator,
  CryptoHashAccumulator,
  type HashAccumulator,
  type HashAccumulatorOptions,
} from "./field/hash.ts";
export { accurateEquals, accurateLess, fieldEquals } from "./field/compare.ts";
export { sumField } from "./field/sum.ts";
export { castField } from "./field/cast.ts";
export { tryConvertToNumber, tryAccurateEquals, tryAccurateLess, trySumField, tryCastField } from "./field/safe.ts";
export { stringToUUID, uuidToString } from "./field/uuid.ts";
export type { DecimalTarget } from "./field/decimal.ts";
export { fieldToJSON, fieldFromJSON, type FieldJSON } from "./field/json.ts";
export {
  evaluateCommand,
  parseCommand,
  type Command,
  type CommandOptions,
  type CommandResult,
} from "./field/command.ts";
