/**
 * Error signaling for field operators.
 */

export const ErrorCodes = {
  LOGICAL_ERROR: 49,
  TYPE_MISMATCH: 53,
  CANNOT_CONVERT_TYPE: 70,
  CANNOT_PARSE_INPUT: 117,
  BAD_TYPE_OF_FIELD: 169,
  BAD_GET: 170,
  VALUE_IS_OUT_OF_RANGE_OF_DATA_TYPE: 321,
} as const;

export type ErrorCodeName = keyof typeof ErrorCodes;

/**
 * Failure raised by a field operator. `code` matches the server-side error code
 * so callers can surface it as a query-level error.
 */
export class FieldError extends Error {
  readonly code: number;
  readonly codeName: ErrorCodeName;

  constructor(codeName: ErrorCodeName, message: string) {
    super(message);
    this.name = "FieldError";
    this.code = ErrorCodes[codeName];
    this.codeName = codeName;
  }

  toString(): string {
    return `${this.name}: ${this.message} (${this.codeName}, code ${this.code})`;
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: FieldError };

/**
 * Run `fn`, turning a FieldError into a failed Result. Anything else is a bug
 * in the caller and is re-thrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof FieldError) return { ok: false, error: err };
    throw err;
  }
}
