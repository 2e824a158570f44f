import type { CryptoProvider } from '../providers/CryptoProvider.js';

export type KeySize = 16 | 24 | 32;

export type CipherMode = 'encrypt' | 'decrypt';

/* ------------------------- Key derivation ---------------------------- */
export interface DerivedKey {
  key  : Uint8Array;
  salt : Uint8Array;
}

/**
 * Password → key. Implementations must size the salt like the key: the
 * envelope stores only the salt length and decoding derives a key of exactly
 * that many bytes.
 */
export interface KeyDerivation {
  readonly name: string;
  derive(
    secret   : Secret,
    keySize  : KeySize,
    provider : CryptoProvider,
  ): Promise<DerivedKey>;
  deriveWithSalt(
    secret : Secret,
    salt   : Uint8Array,
  ): Promise<Uint8Array>;
}

/* ------------------------- Block padding ----------------------------- */
export interface PaddingScheme {
  readonly name: string;
  /** Returns `tail || padding`, exactly one block long. */
  pad(tail: Uint8Array, blockSize: number, rng: (n: number) => Uint8Array): Uint8Array;
  /** Strips padding from the decrypted final block; throws on malformed padding. */
  unpad(lastBlock: Uint8Array, blockSize: number): Uint8Array;
}

export type Secret = {
  value: string;
};
