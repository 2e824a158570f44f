// packages/core/src/header/encoder.ts
import { concat, writeInt32LE } from '../util/bytes.js';
import { saltLengthToKeySize } from './decoder.js';

/** `int32_LE(salt.length) || salt`, the password layer's prefix. */
export function encodeSaltPrefix(salt: Uint8Array): Uint8Array {
  saltLengthToKeySize(salt.length);
  return concat(writeInt32LE(salt.length), salt);
}
