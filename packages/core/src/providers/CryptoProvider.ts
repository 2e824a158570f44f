/** Cryptographically secure randomness; injected so tests can pin IVs and salts. */
export interface CryptoProvider {
  getRandomValues(buf: Uint8Array): Uint8Array;
}

export function randomBytes(provider: CryptoProvider, n: number): Uint8Array {
  return provider.getRandomValues(new Uint8Array(n));
}
