/**
 * Single-quoted literal escaping for strings and raw byte payloads.
 */

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "'": "\\'",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\0": "\\0",
};

function hexEscape(code: number): string {
  return "\\x" + code.toString(16).toUpperCase().padStart(2, "0");
}

export function quoteString(s: string): string {
  let out = "'";
  for (const ch of s) {
    const escaped = ESCAPES[ch];
    if (escaped !== undefined) {
      out += escaped;
      continue;
    }
    const code = ch.charCodeAt(0);
    out += code < 0x20 || code === 0x7f ? hexEscape(code) : ch;
  }
  return out + "'";
}

/** Printable ASCII kept as is, every other byte as \xHH. */
export function quoteBytes(bytes: Uint8Array): string {
  let out = "'";
  for (const b of bytes) {
    const ch = String.fromCharCode(b);
    const escaped = ESCAPES[ch];
    if (escaped !== undefined) out += escaped;
    else if (b < 0x20 || b >= 0x7f) out += hexEscape(b);
    else out += ch;
  }
  return out + "'";
}
