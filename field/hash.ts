/**
 * Feeds a field's type tag and value bytes into an incremental hash.
 *
 * Two fields hash the same only if they have the same kind and content:
 * UInt64(1) and Float64(1) are accurately equal but hash differently.
 */

import { createHash, type Hash } from "node:crypto";
import { applyVisitor, type FieldVisitor } from "./dispatch.ts";
import { DecimalSpec, FieldTypeCode, type DecimalField, type Field, type FieldKind } from "./types.ts";

/** Incremental hash consumed by hashField. */
export interface HashAccumulator {
  update(data: Uint8Array): void;
}

export interface HashAccumulatorOptions {
  /** Any algorithm name the crypto module accepts. Default "sha256". */
  algorithm?: string;
}

/** HashAccumulator backed by node:crypto, with a hex digest at the end. */
export class CryptoHashAccumulator implements HashAccumulator {
  private readonly hash: Hash;

  constructor(options: HashAccumulatorOptions = {}) {
    this.hash = createHash(options.algorithm ?? "sha256");
  }

  update(data: Uint8Array): void {
    this.hash.update(data);
  }

  digest(): string {
    return this.hash.digest("hex");
  }
}

export function createHashAccumulator(options?: HashAccumulatorOptions): CryptoHashAccumulator {
  return new CryptoHashAccumulator(options);
}

// --- Little-endian byte helpers ---

function u8(v: number): Uint8Array {
  return Uint8Array.of(v);
}

function u32(v: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, v, true);
  return out;
}

function u64(v: bigint | number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt.asUintN(64, BigInt(v)), true);
  return out;
}

function f64(v: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setFloat64(0, v, true);
  return out;
}

/** UTF-16LE code units, lone surrogates included. */
function utf16(text: string): Uint8Array {
  const out = new Uint8Array(text.length * 2);
  const view = new DataView(out.buffer);
  for (let i = 0; i < text.length; i++) view.setUint16(i * 2, text.charCodeAt(i), true);
  return out;
}

/** Two's-complement little-endian bytes of `v` in `bytes` bytes. */
function intBytes(v: bigint, bytes: number): Uint8Array {
  const out = new Uint8Array(bytes);
  let x = BigInt.asUintN(bytes * 8, v);
  for (let i = 0; i < bytes; i++) {
    out[i] = Number(x & 0xffn);
    x >>= 8n;
  }
  return out;
}

function hashVisitor(hash: HashAccumulator): FieldVisitor<void> {
  const tag = (kind: FieldKind) => hash.update(u8(FieldTypeCode[kind]));

  const sized = (bytes: Uint8Array) => {
    hash.update(u64(bytes.length));
    hash.update(bytes);
  };

  // length in code units
  const text = (s: string) => {
    hash.update(u64(s.length));
    hash.update(utf16(s));
  };

  const decimal = (f: DecimalField) => {
    tag(f.kind);
    hash.update(intBytes(f.value, DecimalSpec[f.kind].bits / 8));
    hash.update(u32(f.scale));
  };

  const visitor: FieldVisitor<void> = {
    Null: () => tag("Null"),
    UInt64: (f) => {
      tag("UInt64");
      hash.update(u64(f.value));
    },
    Int64: (f) => {
      tag("Int64");
      hash.update(u64(f.value));
    },
    Float64: (f) => {
      tag("Float64");
      hash.update(f64(f.value));
    },
    String: (f) => {
      tag("String");
      text(f.value);
    },
    Array: (f) => {
      tag("Array");
      hash.update(u64(f.value.length));
      for (const item of f.value) applyVisitor(visitor, item);
    },
    Tuple: (f) => {
      tag("Tuple");
      hash.update(u64(f.value.length));
      for (const item of f.value) applyVisitor(visitor, item);
    },
    UInt128: (f) => {
      tag("UInt128");
      hash.update(intBytes(f.value, 16));
    },
    Decimal32: decimal,
    Decimal64: decimal,
    Decimal128: decimal,
    AggregateFunctionState: (f) => {
      tag("AggregateFunctionState");
      text(f.name);
      sized(f.data);
    },
  };
  return visitor;
}

/** Add the field to `hash`. Purely additive; never fails. */
export function hashField(field: Field, hash: HashAccumulator): void {
  applyVisitor(hashVisitor(hash), field);
}

/** One-shot hex digest of a single field. */
export function fieldHash(field: Field, options?: HashAccumulatorOptions): string {
  const acc = createHashAccumulator(options);
  hashField(field, acc);
  return acc.digest();
}
