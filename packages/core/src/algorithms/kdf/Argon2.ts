// packages/core/src/algorithms/kdf/Argon2.ts
import type { DerivedKey, KeyDerivation, KeySize, Secret } from '../../types/index.js';
import { argon2id, type Argon2Tuning } from './argon2-wrapper.js';
import { randomBytes, type CryptoProvider } from '../../providers/CryptoProvider.js';
import { DEFAULT_DIFFICULTIES } from '../../config/defaults.js';

/**
 * Argon2-id Key-Derivation Function.
 *
 * The salt is drawn with the same length as the requested key, so a decoder
 * that only knows the salt can ask {@link deriveWithSalt} for a key of the
 * right size. Tuning is not part of the envelope: decrypt with the same
 * tuning that encrypted.
 */
export class Argon2KDF implements KeyDerivation {
  readonly name = 'argon2id';

  constructor(
    private readonly tuning: Readonly<Argon2Tuning> = DEFAULT_DIFFICULTIES.middle,
  ) {}

  async derive(
    secret: Secret,
    keySize: KeySize,
    provider: CryptoProvider,
  ): Promise<DerivedKey> {
    const salt = randomBytes(provider, keySize);
    const key  = await argon2id(secret.value, salt, this.tuning, keySize);
    return { key, salt };
  }

  async deriveWithSalt(secret: Secret, salt: Uint8Array): Promise<Uint8Array> {
    return argon2id(secret.value, salt, this.tuning, salt.length);
  }
}
