// packages/core/src/util/validate.ts
import { InvalidArgumentError } from '../errors/index.js';
import { IV_LENGTH, KEY_SIZES, MAX_ALLOWED_CHUNK_SIZE } from '../config/defaults.js';
import type { KeySize } from '../types/index.js';

export function isKeySize(n: number): n is KeySize {
  return (KEY_SIZES as readonly number[]).includes(n);
}

export function assertKeySize(n: number): asserts n is KeySize {
  if (!isKeySize(n)) {
    throw new InvalidArgumentError(`keySize must be 16, 24 or 32 bytes, got ${n}`);
  }
}

export function assertKey(key: Uint8Array): void {
  if (!(key instanceof Uint8Array) || !isKeySize(key.length)) {
    throw new InvalidArgumentError('key must be 16, 24 or 32 bytes in length');
  }
}

export function assertIv(iv: Uint8Array): void {
  if (!(iv instanceof Uint8Array) || iv.length !== IV_LENGTH) {
    throw new InvalidArgumentError(`iv must be ${IV_LENGTH} bytes in length`);
  }
}

export function assertChunkSize(bytes: number): number {
  if (!Number.isInteger(bytes) || bytes < 1) {
    throw new InvalidArgumentError(`Invalid chunkSize: ${bytes}. Must be a positive integer.`);
  }
  if (bytes > MAX_ALLOWED_CHUNK_SIZE) {
    throw new InvalidArgumentError(`chunkSize cannot exceed ${MAX_ALLOWED_CHUNK_SIZE} bytes.`);
  }
  return bytes;
}
