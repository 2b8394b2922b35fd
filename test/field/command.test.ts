import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { evaluateCommand, parseCommand } from "../../field/command.ts";

const run = (json: unknown) => evaluateCommand(parseCommand(json));
const parseError = { name: "FieldError", codeName: "CANNOT_PARSE_INPUT" };

describe("evaluateCommand", () => {
  it("compares", () => {
    assert.equal(run({ op: "less", args: [{ UInt64: "1" }, { Float64: 1.5 }] }), true);
    assert.equal(run({ op: "equals", args: [{ Decimal64: "1.50" }, { Decimal32: "1.5" }] }), true);
    assert.equal(run({ op: "identical", args: [{ Decimal64: "1.50" }, { Decimal64: "1.5" }] }), false);
  });

  it("renders", () => {
    assert.equal(run({ op: "toString", args: [{ Decimal64: "1.50" }] }), "1.50");
    assert.equal(run({ op: "dump", args: [{ Array: [{ Int64: "-1" }] }] }), "Array_[Int64_-1]");
  });

  it("converts and casts, with 64-bit results as strings", () => {
    assert.equal(run({ op: "convert", type: "Float64", args: [{ Decimal64: "1.50" }] }), 1.5);
    assert.equal(run({ op: "convert", type: "Int64", args: [{ Decimal64: "1.50" }] }), "1");
    assert.equal(run({ op: "cast", type: "UInt128", args: [{ UInt64: "9" }] }), "9");
    assert.throws(() => run({ op: "cast", type: "UInt32", args: [{ Int64: "-1" }] }), {
      codeName: "VALUE_IS_OUT_OF_RANGE_OF_DATA_TYPE",
    });
  });

  it("takes decimal targets with a scale, answering decimal text", () => {
    assert.equal(run({ op: "cast", type: "Decimal64(2)", args: [{ Float64: 0.1 }] }), "0.10");
    assert.equal(run({ op: "convert", type: "Decimal32(1)", args: [{ Decimal64: "1.55" }] }), "1.5");
    assert.throws(() => run({ op: "cast", type: "Decimal32(0)", args: [{ Int64: "3000000000" }] }), {
      codeName: "VALUE_IS_OUT_OF_RANGE_OF_DATA_TYPE",
      message: "Cannot cast Field value '3000000000' of type 'Int64' to 'Decimal32(0)'",
    });
  });

  it("sums into the first argument", () => {
    assert.deepEqual(run({ op: "sum", args: [{ UInt64: "5" }, { UInt64: "3" }] }), {
      nonzero: true,
      value: { UInt64: "8" },
    });
  });

  it("hashes with the configured algorithm", () => {
    const cmd = parseCommand({ op: "hash", args: [null] });
    const sha1 = evaluateCommand(cmd, { hash: { algorithm: "sha1" } });
    assert.equal(typeof sha1 === "string" && sha1.length, 40);
  });
});

describe("parseCommand", () => {
  it("rejects malformed commands", () => {
    assert.throws(() => parseCommand("less"), parseError);
    assert.throws(() => parseCommand({ op: "divide", args: [] }), parseError);
    assert.throws(() => parseCommand({ op: "less", args: null }), parseError);
    assert.throws(() => parseCommand({ op: "cast", type: "Int256", args: [] }), {
      ...parseError,
      message: 'Unknown numeric type "Int256"',
    });
    assert.throws(() => parseCommand({ op: "cast", type: "Decimal32(10)", args: [] }), {
      ...parseError,
      message: "Decimal32 scale out of range: 10 not in [0, 9]",
    });
    assert.throws(() => parseCommand({ op: "cast", type: "Decimal64(-1)", args: [] }), {
      ...parseError,
      message: 'Unknown numeric type "Decimal64(-1)"',
    });
  });

  it("checks arity and target type at evaluation", () => {
    assert.throws(() => run({ op: "less", args: [null] }), {
      ...parseError,
      message: "less takes 2 field(s), got 1",
    });
    assert.throws(() => run({ op: "cast", args: [null] }), { ...parseError, message: 'cast needs a "type"' });
    assert.throws(() => run({ op: "convert", type: "UInt128", args: [null] }), {
      ...parseError,
      message: "convert cannot target UInt128",
    });
  });
});
