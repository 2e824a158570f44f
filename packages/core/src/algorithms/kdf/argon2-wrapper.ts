// packages/core/src/algorithms/kdf/argon2-wrapper.ts
/**
 * Argon2-id over the native `@node-rs/argon2` addon, loaded on first use.
 */
import { KeyDerivationError } from '../../errors/index.js';

/** Minimal subset of tuning parameters we expose */
export interface Argon2Tuning {
  time: number; // iterations
  mem: number; // kibibytes
  parallelism: number; // lanes
}

/**
 * Derive `outputLen` raw bytes with Argon2-id.
 *
 * @param password   UTF-8 string or raw bytes
 * @param salt       random salt (≥ 8 bytes)
 * @param opts       memory/time/parallelism
 * @param outputLen  key length in bytes
 */
export async function argon2id(
  password: Uint8Array | string,
  salt: Uint8Array,
  opts: Argon2Tuning,
  outputLen: number,
): Promise<Uint8Array> {
  const argon2 = await import('@node-rs/argon2');
  const pwdBuf = typeof password === 'string' ? Buffer.from(password, 'utf8') : Buffer.from(password);

  try {
    const raw = await argon2.hashRaw(pwdBuf, {
      salt: Buffer.from(salt),
      timeCost: opts.time,
      memoryCost: opts.mem,
      parallelism: opts.parallelism,
      outputLen,
    });
    const key = new Uint8Array(raw);
    raw.fill(0);
    return key;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new KeyDerivationError(`argon2 failure: ${message}`, { cause: err });
  } finally {
    pwdBuf.fill(0);
  }
}
