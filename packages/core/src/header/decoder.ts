// packages/core/src/header/decoder.ts
import { IV_LENGTH, SALT_PREFIX_BYTES } from '../config/defaults.js';
import { MalformedEnvelopeError } from '../errors/index.js';
import type { KeySize } from '../types/index.js';
import { readInt32LE } from '../util/bytes.js';
import type { ByteReader } from '../util/stream.js';
import { isKeySize } from '../util/validate.js';

export interface EnvelopeHeader {
  /** AES key size in bytes, carried as the salt length. */
  keySize   : KeySize;
  salt      : Uint8Array;
  iv        : Uint8Array;
  /** Bytes before the ciphertext: prefix + salt + IV. */
  headerLen : number;
}

/**
 * The salt length doubles as the key size; anything else cannot have come
 * from a conforming encoder.
 */
export function saltLengthToKeySize(n: number): KeySize {
  if (!isKeySize(n)) {
    throw new MalformedEnvelopeError(`Invalid salt length ${n}; expected 16, 24 or 32`);
  }
  return n;
}

/** Consume `int32_LE(len) || salt[len]` from the reader and return the salt. */
export async function readSaltPrefix(reader: ByteReader): Promise<Uint8Array> {
  const lenBytes = await reader.readExact(SALT_PREFIX_BYTES, 'salt length');
  const saltLen  = saltLengthToKeySize(readInt32LE(lenBytes));
  return reader.readExact(saltLen, 'salt');
}

/** Parse the password-envelope header from the leading bytes of `buf`. */
export function decodeHeader(buf: Uint8Array): EnvelopeHeader {
  if (buf.length < SALT_PREFIX_BYTES) {
    throw new MalformedEnvelopeError('Invalid input format. Header too short.');
  }

  const keySize   = saltLengthToKeySize(readInt32LE(buf));
  const ivStart   = SALT_PREFIX_BYTES + keySize;
  const headerLen = ivStart + IV_LENGTH;

  if (buf.length < headerLen) {
    throw new MalformedEnvelopeError('Invalid input format. Header truncated.');
  }

  return {
    keySize,
    salt: new Uint8Array(buf.subarray(SALT_PREFIX_BYTES, ivStart)),
    iv  : new Uint8Array(buf.subarray(ivStart, headerLen)),
    headerLen,
  };
}
