/**
 * Canonical UUID text <-> UInt128 value.
 *
 * The 128-bit value is the big-endian integer of the 16 UUID bytes in text
 * order, so numeric order of UInt128 values equals byte order of the UUIDs.
 */

import { FieldError } from "./errors.ts";

// Hex lookup tables: char code -> nibble (255 = invalid), byte -> "00".."ff"
const HEX_LUT = new Uint8Array(256).fill(255);
const BYTE_TO_HEX: string[] = [];
for (let i = 0; i < 256; i++) BYTE_TO_HEX[i] = i.toString(16).padStart(2, "0");
for (let i = 0; i < 10; i++) HEX_LUT[48 + i] = i; // '0'-'9'
for (let i = 0; i < 6; i++) {
  HEX_LUT[65 + i] = 10 + i; // 'A'-'F'
  HEX_LUT[97 + i] = 10 + i; // 'a'-'f'
}

const HYPHENS = [8, 13, 18, 23];

/**
 * Parse hyphenated (36 chars) or bare (32 chars) UUID text.
 * Returns null for anything else.
 */
export function parseUUID(text: string): bigint | null {
  const hyphenated = text.length === 36;
  if (!hyphenated && text.length !== 32) return null;

  let value = 0n;
  for (let i = 0; i < text.length; i++) {
    if (hyphenated && HYPHENS.includes(i)) {
      if (text[i] !== "-") return null;
      continue;
    }
    const code = text.charCodeAt(i);
    const nibble = code < 256 ? HEX_LUT[code] : 255;
    if (nibble === 255) return null;
    value = (value << 4n) | BigInt(nibble);
  }
  return value;
}

/** UUID text to its 128-bit value; invalid text is a conversion failure. */
export function stringToUUID(text: string): bigint {
  const value = parseUUID(text);
  if (value === null) {
    throw new FieldError("CANNOT_CONVERT_TYPE", `Cannot parse UUID from String '${text}'`);
  }
  return value;
}

/** 128-bit value to lowercase hyphenated UUID text. */
export function uuidToString(value: bigint): string {
  let hex = "";
  for (let shift = 120n; shift >= 0n; shift -= 8n) {
    hex += BYTE_TO_HEX[Number((value >> shift) & 0xffn)];
  }
  return (
    hex.slice(0, 8) + "-" + hex.slice(8, 12) + "-" + hex.slice(12, 16) + "-" +
    hex.slice(16, 20) + "-" + hex.slice(20)
  );
}
