import type { Argon2Tuning } from '../algorithms/kdf/argon2-wrapper.js';
import type { KeySize } from '../types/index.js';

/** AES block size in bytes; also the IV length of CBC. */
export const BLOCK_SIZE = 16 as const;
export const IV_LENGTH  = BLOCK_SIZE;

export const KEY_SIZES: readonly KeySize[] = [16, 24, 32];
export const DEFAULT_KEY_SIZE: KeySize     = 32;

/** `int32_LE(salt_len)` in front of the salt of a password envelope. */
export const SALT_PREFIX_BYTES = 4 as const;

/** Read size of the streaming loop: one cipher block per read. */
export const DEFAULT_CHUNK_SIZE     = BLOCK_SIZE;
export const MAX_ALLOWED_CHUNK_SIZE = 128 * 1024 * 1024; // 128 MiB

export const DEFAULT_DIFFICULTIES = {
  low   : { time:  3, mem:  64 * 1024, parallelism: 1 },
  middle: { time:  5, mem:  64 * 1024, parallelism: 1 },
  high  : { time: 10, mem: 128 * 1024, parallelism: 2 },
} as const satisfies Record<string, Argon2Tuning>;

export type Difficulty = keyof typeof DEFAULT_DIFFICULTIES;
