/**
 * Visitor dispatch over the closed set of field kinds.
 *
 * Every operator in this package is a visitor object applied through
 * applyVisitor / applyBinaryVisitor; nothing else branches on a field's kind.
 */

import type { DecimalField, DecimalKind, Field, FieldKind, FieldOf } from "./types.ts";

/** One branch per kind. The branch receives the field object itself, so it may mutate it. */
export type FieldVisitor<R> = { [K in FieldKind]: (field: FieldOf<K>) => R };

/** Some branches plus a fallback for every kind left out. */
export type PartialFieldVisitor<R> = Partial<FieldVisitor<R>> & {
  otherwise: (field: Field) => R;
};

/** Resolving the left operand yields the visitor for the right one. */
export type BinaryFieldVisitor<R> = FieldVisitor<PartialFieldVisitor<R>>;

export function applyVisitor<R>(visitor: FieldVisitor<R>, field: Field): R {
  switch (field.kind) {
    case "Null": return visitor.Null(field);
    case "UInt64": return visitor.UInt64(field);
    case "Int64": return visitor.Int64(field);
    case "Float64": return visitor.Float64(field);
    case "String": return visitor.String(field);
    case "Array": return visitor.Array(field);
    case "Tuple": return visitor.Tuple(field);
    case "UInt128": return visitor.UInt128(field);
    case "Decimal32": return visitor.Decimal32(field);
    case "Decimal64": return visitor.Decimal64(field);
    case "Decimal128": return visitor.Decimal128(field);
    case "AggregateFunctionState": return visitor.AggregateFunctionState(field);
    default: {
      const unreachable: never = field;
      throw new Error(`Unknown field kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Fill the missing branches of a partial visitor with its fallback. */
export function completeVisitor<R>(visitor: PartialFieldVisitor<R>): FieldVisitor<R> {
  const { otherwise } = visitor;
  return {
    Null: visitor.Null ?? otherwise,
    UInt64: visitor.UInt64 ?? otherwise,
    Int64: visitor.Int64 ?? otherwise,
    Float64: visitor.Float64 ?? otherwise,
    String: visitor.String ?? otherwise,
    Array: visitor.Array ?? otherwise,
    Tuple: visitor.Tuple ?? otherwise,
    UInt128: visitor.UInt128 ?? otherwise,
    Decimal32: visitor.Decimal32 ?? otherwise,
    Decimal64: visitor.Decimal64 ?? otherwise,
    Decimal128: visitor.Decimal128 ?? otherwise,
    AggregateFunctionState: visitor.AggregateFunctionState ?? otherwise,
  };
}

export function applyPartialVisitor<R>(visitor: PartialFieldVisitor<R>, field: Field): R {
  return applyVisitor(completeVisitor(visitor), field);
}

/** Nested dispatch: left kind first, then right kind. */
export function applyBinaryVisitor<R>(visitor: BinaryFieldVisitor<R>, left: Field, right: Field): R {
  return applyPartialVisitor(applyVisitor(visitor, left), right);
}

/** The same branch for all three decimal widths. */
export function decimalBranches<R>(
  fn: (field: DecimalField) => R,
): { [K in DecimalKind]: (field: FieldOf<K>) => R } {
  return { Decimal32: fn, Decimal64: fn, Decimal128: fn };
}
