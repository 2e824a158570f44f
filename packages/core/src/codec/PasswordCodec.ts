// packages/core/src/codec/PasswordCodec.ts
import { DEFAULT_KEY_SIZE } from '../config/defaults.js';
import { EnvelopeError, KeyDerivationError } from '../errors/index.js';
import { encodeSaltPrefix } from '../header/encoder.js';
import { readSaltPrefix } from '../header/decoder.js';
import type { CryptoProvider } from '../providers/CryptoProvider.js';
import type { KeyDerivation, Secret } from '../types/index.js';
import { wipe, zeroizeString } from '../util/bytes.js';
import type { Logger } from '../util/logger.js';
import type { ByteReader, ByteSink } from '../util/stream.js';
import { assertKeySize } from '../util/validate.js';
import type { IvEmbeddingCodec } from './IvEmbeddingCodec.js';

/**
 * Password form: `int32_LE(salt_len) || salt || iv[16] || ciphertext`.
 *
 * The salt length is the key size. Decoding rejects any other salt length,
 * and a KDF handing back a key that does not match its salt is treated as a
 * derivation failure rather than producing garbage plaintext.
 */
export class PasswordCodec {
  constructor(
    private readonly provider : CryptoProvider,
    private readonly kdf      : KeyDerivation,
    private readonly inner    : IvEmbeddingCodec,
    private readonly log      : Logger,
  ) {}

  async encrypt(
    reader  : ByteReader,
    sink    : ByteSink,
    secret  : Secret,
    keySize : number = DEFAULT_KEY_SIZE,
  ): Promise<void> {
    assertKeySize(keySize);
    const size = keySize;

    const { key, salt } = await this.derive(
      () => this.kdf.derive(secret, size, this.provider),
      secret,
    );

    try {
      if (salt.length !== size || key.length !== size) {
        throw new KeyDerivationError(
          `${this.kdf.name} returned a ${key.length}-byte key with a ${salt.length}-byte salt; expected ${size} for both`,
        );
      }
      await sink.write(encodeSaltPrefix(salt));
      await this.inner.encrypt(reader, sink, key);
    } finally {
      wipe(key);
    }
  }

  async decrypt(reader: ByteReader, sink: ByteSink, secret: Secret): Promise<void> {
    const salt = await readSaltPrefix(reader);
    this.log.log(3, `Salt length ${salt.length} → AES-${salt.length * 8}`);

    const key = await this.derive(() => this.kdf.deriveWithSalt(secret, salt), secret);

    try {
      if (key.length !== salt.length) {
        throw new KeyDerivationError(
          `${this.kdf.name} returned a ${key.length}-byte key for a ${salt.length}-byte salt`,
        );
      }
      await this.inner.decrypt(reader, sink, key);
    } finally {
      wipe(key);
    }
  }

  private async derive<T>(fn: () => Promise<T>, secret: Secret): Promise<T> {
    const start = performance.now();
    try {
      const out = await fn();
      this.log.log(3, `Key derivation (${this.kdf.name}) completed in ${(performance.now() - start).toFixed(1)} ms`);
      return out;
    } catch (err) {
      if (err instanceof EnvelopeError) throw err;
      throw new KeyDerivationError(
        err instanceof Error ? err.message : String(err),
        { cause: err },
      );
    } finally {
      zeroizeString(secret);
    }
  }
}
