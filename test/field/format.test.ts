/**
 * fieldToString (query literal) and fieldDump (diagnostic) rendering.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { Field } from "../../field/types.ts";
import { fieldToString } from "../../field/to_string.ts";
import { fieldDump } from "../../field/dump.ts";

const UUID_TEXT = "61f0c404-5cb3-11e7-907b-a6006ad3dba0";

describe("fieldToString", () => {
  it("renders scalars", () => {
    assert.equal(fieldToString(Field.Null), "NULL");
    assert.equal(fieldToString(Field.UInt64(18446744073709551615n)), "18446744073709551615");
    assert.equal(fieldToString(Field.Int64(-42)), "-42");
    assert.equal(fieldToString(Field.Float64(1.5)), "1.5");
    assert.equal(fieldToString(Field.Float64(1e21)), "1e+21");
  });

  it("renders special floats", () => {
    assert.equal(fieldToString(Field.Float64(Infinity)), "inf");
    assert.equal(fieldToString(Field.Float64(-Infinity)), "-inf");
    assert.equal(fieldToString(Field.Float64(NaN)), "nan");
    assert.equal(fieldToString(Field.Float64(-0)), "-0");
  });

  it("quotes and escapes strings", () => {
    assert.equal(fieldToString(Field.String("it's")), String.raw`'it\'s'`);
    assert.equal(fieldToString(Field.String("a\nb\tc")), String.raw`'a\nb\tc'`);
    assert.equal(fieldToString(Field.String("back\\slash")), String.raw`'back\\slash'`);
    assert.equal(fieldToString(Field.String("\x01\x7f")), String.raw`'\x01\x7F'`);
    assert.equal(fieldToString(Field.String("héllo")), "'héllo'");
  });

  it("renders arrays and tuples", () => {
    assert.equal(fieldToString(Field.Array(Field.UInt64(1), Field.String("x"))), "[1, 'x']");
    assert.equal(fieldToString(Field.Array()), "[]");
    assert.equal(fieldToString(Field.Tuple(Field.UInt64(1), Field.UInt64(2))), "(1, 2)");
    assert.equal(fieldToString(Field.Tuple(Field.UInt64(1))), "tuple(1)");
    assert.equal(fieldToString(Field.Tuple()), "tuple()");
    assert.equal(
      fieldToString(Field.Array(Field.Tuple(Field.Decimal32(5, 1), Field.Null), Field.Array())),
      "[(0.5, NULL), []]",
    );
  });

  it("renders UInt128 as quoted UUID text", () => {
    assert.equal(fieldToString(Field.UUID(UUID_TEXT)), `'${UUID_TEXT}'`);
  });

  it("renders decimals with their scale", () => {
    assert.equal(fieldToString(Field.Decimal64(150, 2)), "1.50");
    assert.equal(fieldToString(Field.Decimal32(-5, 3)), "-0.005");
    assert.equal(fieldToString(Field.Decimal128(7, 0)), "7");
  });

  it("renders aggregate state bytes as an escaped literal", () => {
    const state = Field.AggregateFunctionState("sum(UInt64)", Uint8Array.of(0x41, 0x00, 0xff));
    assert.equal(fieldToString(state), String.raw`'A\0\xFF'`);
  });

  it("does not modify the field", () => {
    const field = Field.Array(Field.Int64(3));
    assert.equal(fieldToString(field), fieldToString(field));
    assert.deepEqual(field, Field.Array(Field.Int64(3)));
  });
});

describe("fieldDump", () => {
  it("prefixes numbers with their kind", () => {
    assert.equal(fieldDump(Field.Null), "NULL");
    assert.equal(fieldDump(Field.UInt64(5)), "UInt64_5");
    assert.equal(fieldDump(Field.Int64(-3)), "Int64_-3");
    assert.equal(fieldDump(Field.Float64(1.5)), "Float64_1.5");
    assert.equal(fieldDump(Field.Float64(-Infinity)), "Float64_-inf");
  });

  it("distinguishes kinds that print alike", () => {
    const dumps = [Field.UInt64(1), Field.Int64(1), Field.Float64(1)].map(fieldDump);
    assert.deepEqual(dumps, ["UInt64_1", "Int64_1", "Float64_1"]);
  });

  it("dumps containers recursively", () => {
    assert.equal(fieldDump(Field.String("a'b")), String.raw`'a\'b'`);
    assert.equal(fieldDump(Field.Array(Field.UInt64(1), Field.UInt64(2))), "Array_[UInt64_1, UInt64_2]");
    assert.equal(fieldDump(Field.Tuple(Field.Int64(1), Field.String("x"))), "Tuple_(Int64_1, 'x')");
    assert.equal(fieldDump(Field.Tuple()), "Tuple_()");
  });

  it("dumps UInt128 as low and high halves", () => {
    assert.equal(fieldDump(Field.UInt128((2n << 64n) | 5n)), "UInt128_5_2");
  });

  it("dumps decimals as magnitude and scale", () => {
    assert.equal(fieldDump(Field.Decimal64(150, 2)), "Decimal64_(150, 2)");
    assert.equal(fieldDump(Field.Decimal32(-7, 0)), "Decimal32_(-7, 0)");
  });

  it("dumps aggregate state name and bytes", () => {
    const state = Field.AggregateFunctionState("sum(UInt64)", Uint8Array.of(1, 2));
    assert.equal(fieldDump(state), String.raw`AggregateFunctionState_('sum(UInt64)', '\x01\x02')`);
  });
});
