import { Buffer } from 'node:buffer';

const utf8 = new TextEncoder();

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Hex  ------------------------------------------------- */

/** Two lowercase hex digits */
export function hexByte(b: number): string {
  return b.toString(16).padStart(2, '0');
}

export function hexEncode(u8: Uint8Array): string {
  let s = '';
  for (let i = 0; i < u8.length; i++) s += hexByte(u8[i]);
  return s;
}

/* ----------  Base64  ---------------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  return Buffer.from(concat(...chunks)).toString('base64');
}

/* ----------  Text  ------------------------------------------------ */

/** Encode rendered text for the output sink */
export function textBytes(s: string): Uint8Array {
  return utf8.encode(s);
}
