import assert from "node:assert";
import { describe, it } from "node:test";
import {
  applyBinaryVisitor,
  applyPartialVisitor,
  applyVisitor,
  completeVisitor,
  type BinaryFieldVisitor,
  type FieldVisitor,
} from "../../field/dispatch.ts";
import { Field } from "../../field/types.ts";

const kindOf: FieldVisitor<string> = {
  Null: () => "null",
  UInt64: (f) => `u${f.value}`,
  Int64: (f) => `i${f.value}`,
  Float64: (f) => `f${f.value}`,
  String: (f) => `s${f.value}`,
  Array: (f) => `a${f.value.length}`,
  Tuple: (f) => `t${f.value.length}`,
  UInt128: (f) => `x${f.value}`,
  Decimal32: (f) => `d32:${f.value}/${f.scale}`,
  Decimal64: (f) => `d64:${f.value}/${f.scale}`,
  Decimal128: (f) => `d128:${f.value}/${f.scale}`,
  AggregateFunctionState: (f) => `agg:${f.name}`,
};

describe("applyVisitor", () => {
  it("invokes the branch of the active kind", () => {
    assert.strictEqual(applyVisitor(kindOf, Field.Null), "null");
    assert.strictEqual(applyVisitor(kindOf, Field.UInt64(7n)), "u7");
    assert.strictEqual(applyVisitor(kindOf, Field.Int64(-7)), "i-7");
    assert.strictEqual(applyVisitor(kindOf, Field.Float64(0.5)), "f0.5");
    assert.strictEqual(applyVisitor(kindOf, Field.String("q")), "sq");
    assert.strictEqual(applyVisitor(kindOf, Field.Array(Field.Null, Field.Null)), "a2");
    assert.strictEqual(applyVisitor(kindOf, Field.Tuple(Field.Null)), "t1");
    assert.strictEqual(applyVisitor(kindOf, Field.UInt128(9n)), "x9");
    assert.strictEqual(applyVisitor(kindOf, Field.Decimal32(15, 1)), "d32:15/1");
    assert.strictEqual(applyVisitor(kindOf, Field.Decimal64(15, 1)), "d64:15/1");
    assert.strictEqual(applyVisitor(kindOf, Field.Decimal128(15, 1)), "d128:15/1");
    assert.strictEqual(applyVisitor(kindOf, Field.AggregateFunctionState("sum", new Uint8Array())), "agg:sum");
  });

  it("passes the field object itself, so branches can mutate it", () => {
    const field = Field.UInt64(1n);
    applyVisitor({ ...kindOf, UInt64: (f) => { f.value = 42n; return ""; } }, field);
    assert.strictEqual(field.value, 42n);
  });
});

describe("applyPartialVisitor", () => {
  it("falls back to otherwise for kinds without a branch", () => {
    const visitor = { String: () => "string", otherwise: () => "other" };
    assert.strictEqual(applyPartialVisitor(visitor, Field.String("a")), "string");
    assert.strictEqual(applyPartialVisitor(visitor, Field.UInt64(1n)), "other");
    assert.strictEqual(applyPartialVisitor(visitor, Field.Null), "other");
  });

  it("completeVisitor fills every kind", () => {
    const full = completeVisitor({ Int64: () => 1, otherwise: () => 0 });
    assert.strictEqual(full.Int64(Field.Int64(3)), 1);
    assert.strictEqual(full.Decimal128(Field.Decimal128(3, 0)), 0);
  });
});

describe("applyBinaryVisitor", () => {
  it("resolves the left kind, then the right kind", () => {
    const pair: BinaryFieldVisitor<string> = {
      Null: () => ({ otherwise: (r) => `Null/${applyVisitor(kindOf, r)}` }),
      UInt64: (l) => ({
        Int64: (r) => `u${l.value}+i${r.value}`,
        otherwise: (r) => `u${l.value}/${applyVisitor(kindOf, r)}`,
      }),
      Int64: () => ({ otherwise: () => "Int64" }),
      Float64: () => ({ otherwise: () => "Float64" }),
      String: () => ({ otherwise: () => "String" }),
      Array: () => ({ otherwise: () => "Array" }),
      Tuple: () => ({ otherwise: () => "Tuple" }),
      UInt128: () => ({ otherwise: () => "UInt128" }),
      Decimal32: () => ({ otherwise: () => "Decimal32" }),
      Decimal64: () => ({ otherwise: () => "Decimal64" }),
      Decimal128: () => ({ otherwise: () => "Decimal128" }),
      AggregateFunctionState: () => ({ otherwise: () => "AggregateFunctionState" }),
    };
    assert.strictEqual(applyBinaryVisitor(pair, Field.UInt64(1n), Field.Int64(2)), "u1+i2");
    assert.strictEqual(applyBinaryVisitor(pair, Field.UInt64(1n), Field.String("z")), "u1/sz");
    assert.strictEqual(applyBinaryVisitor(pair, Field.Null, Field.Float64(2)), "Null/f2");
    assert.strictEqual(applyBinaryVisitor(pair, Field.Tuple(), Field.Null), "Tuple");
  });
});
