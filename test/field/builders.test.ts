import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { Field, UINT64_MAX, INT64_MIN, UINT128_MAX } from "../../field/types.ts";
import { FieldError, attempt } from "../../field/errors.ts";
import { parseUUID, stringToUUID, uuidToString } from "../../field/uuid.ts";

describe("Field builders", () => {
  it("accept numbers and bigints within range", () => {
    assert.equal(Field.UInt64(5).value, 5n);
    assert.equal(Field.UInt64(UINT64_MAX).value, UINT64_MAX);
    assert.equal(Field.Int64(INT64_MIN).value, INT64_MIN);
    assert.equal(Field.UInt128(UINT128_MAX).value, UINT128_MAX);
    assert.deepEqual(Field.Decimal64(150, 2), { kind: "Decimal64", value: 150n, scale: 2 });
  });

  it("reject out-of-range integers with RangeError", () => {
    assert.throws(() => Field.UInt64(-1), RangeError);
    assert.throws(() => Field.UInt64(UINT64_MAX + 1n), RangeError);
    assert.throws(() => Field.Int64(INT64_MIN - 1n), RangeError);
    assert.throws(() => Field.Int64(2 ** 53), /cannot safely represent/);
    assert.throws(() => Field.Decimal32(2 ** 31, 0), RangeError);
    assert.throws(() => Field.Decimal32(-(2 ** 31) - 1, 0), RangeError);
  });

  it("reject non-integral numbers with TypeError", () => {
    assert.throws(() => Field.UInt64(1.5), TypeError);
    assert.throws(() => Field.Int64(NaN), TypeError);
  });

  it("bound decimal scales by width", () => {
    assert.equal(Field.Decimal32(1, 9).scale, 9);
    assert.throws(() => Field.Decimal32(1, 10), /Decimal32 scale out of range: 10 not in \[0, 9\]/);
    assert.throws(() => Field.Decimal64(1, 19), RangeError);
    assert.equal(Field.Decimal128(1, 38).scale, 38);
    assert.throws(() => Field.Decimal128(1, -1), RangeError);
    assert.throws(() => Field.Decimal128(1, 1.5), RangeError);
  });

  it("Null is a shared frozen instance", () => {
    assert.equal(Field.Null, Field.Null);
    assert.ok(Object.isFrozen(Field.Null));
  });

  it("UUID parses to a UInt128 field", () => {
    assert.deepEqual(Field.UUID("00000000-0000-0000-0000-00000000000a"), { kind: "UInt128", value: 10n });
    assert.throws(() => Field.UUID("xyz"), { name: "TypeError", message: 'Invalid UUID: "xyz"' });
  });
});

describe("UUID text", () => {
  const text = "61f0c404-5cb3-11e7-907b-a6006ad3dba0";

  it("round-trips canonical text", () => {
    assert.equal(uuidToString(stringToUUID(text)), text);
  });

  it("places the first byte of the text in the high bits", () => {
    assert.equal(stringToUUID("01000000-0000-0000-0000-000000000000"), 1n << 120n);
    assert.equal(stringToUUID("00000000-0000-0000-0000-000000000001"), 1n);
    assert.equal(stringToUUID("ffffffff-ffff-ffff-ffff-ffffffffffff"), UINT128_MAX);
  });

  it("accepts uppercase and the bare form, and prints lowercase", () => {
    assert.equal(uuidToString(stringToUUID(text.toUpperCase())), text);
    assert.equal(uuidToString(stringToUUID(text.replaceAll("-", ""))), text);
  });

  it("rejects malformed text", () => {
    assert.equal(parseUUID(""), null);
    assert.equal(parseUUID("61f0c404x5cb3-11e7-907b-a6006ad3dba0"), null);
    assert.equal(parseUUID("61f0c404-5cb3-11e7-907b-a6006ad3dbag"), null);
    assert.equal(parseUUID("61f0c404-5cb3-11e7-907b-a6006ad3dba"), null);
    assert.throws(() => stringToUUID("not-a-uuid"), {
      name: "FieldError",
      codeName: "CANNOT_CONVERT_TYPE",
      code: 70,
      message: "Cannot parse UUID from String 'not-a-uuid'",
    });
  });
});

describe("FieldError", () => {
  it("carries the numeric code and its name", () => {
    const err = new FieldError("BAD_GET", "Bad get");
    assert.ok(err instanceof Error);
    assert.equal(err.code, 170);
    assert.equal(err.toString(), "FieldError: Bad get (BAD_GET, code 170)");
  });

  it("attempt captures FieldError and re-throws anything else", () => {
    assert.deepEqual(attempt(() => 1), { ok: true, value: 1 });
    const failed = attempt(() => stringToUUID("x"));
    assert.equal(failed.ok, false);
    if (!failed.ok) assert.equal(failed.error.codeName, "CANNOT_CONVERT_TYPE");
    assert.throws(() => attempt(() => { throw new TypeError("boom"); }), TypeError);
  });
});
