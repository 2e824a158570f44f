import { EncodingError, DecodingError } from "../errors/index.js";

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

/* ------------------------------------------------------------------ */

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

/* ----------  Base64 encode  --------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  try {
    return Buffer.from(concat(...chunks)).toString('base64');
  } catch (err) {
    throw new EncodingError('Base64 Encoding Error', { cause: err });
  }
}

/* ----------  Base64 decode  --------------------------------------- */
export function base64Decode(b64: string): Uint8Array {
  if (b64.length === 0) return new Uint8Array(0);
  if (!BASE64_RE.test(b64) || b64.length % 4 !== 0) {
    throw new DecodingError(
      `Invalid Base64: length=${b64.length}, content='${b64.slice(0, 12)}…'`,
    );
  }
  return new Uint8Array(Buffer.from(b64, 'base64'));
}

export function isBase64(text: string): boolean {
  return BASE64_RE.test(text) && text.length % 4 === 0;
}

/* ----------  Fixed-width integers  -------------------------------- */
export function writeInt32LE(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setInt32(0, n, true);
  return out;
}

export function readInt32LE(buf: Uint8Array, off = 0): number {
  if (buf.length - off < 4) {
    throw new RangeError('Not enough bytes for a 32-bit integer');
  }
  return new DataView(buf.buffer, buf.byteOffset + off, 4).getInt32(0, true);
}

/* ----------  Wiping  ---------------------------------------------- */
export function wipe(...bufs: (Uint8Array | null | undefined)[]): void {
  for (const b of bufs) b?.fill(0);
}

export function zeroizeString(ref: { value: string }): void {
  /* Overwrite the existing string reference before GC kicks in */
  ref.value = '\0'.repeat(ref.value.length);
}
