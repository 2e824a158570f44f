import { AesEnvelope, EnvelopeError } from '../src/index.js';
import { nodeProvider } from '../../node-runtime/src/provider.js';
import { FakeKdf, pattern } from './_helper.js';

/** Decrypt or report the failure; either way the plaintext must not come back. */
async function attempt(fn: () => Promise<Uint8Array>): Promise<Uint8Array | EnvelopeError> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof EnvelopeError) return err;
    throw err;
  }
}

describe('tamper sensitivity', () => {
  const crypt = new AesEnvelope(nodeProvider, { kdf: new FakeKdf() });
  const plain = pattern(20);

  it('flipping any bit of IV or ciphertext never yields the plaintext (key form)', async () => {
    const key    = pattern(32, 1);
    const cipher = await crypt.encryptWithKey(plain, key);

    for (let bit = 0; bit < cipher.length * 8; bit++) {
      const bad = cipher.slice();
      bad[bit >> 3] ^= 1 << (bit & 7);
      const out = await attempt(() => crypt.decryptWithKey(bad, key));
      expect(out).not.toEqual(plain);
    }
  });

  it('flipping any bit after the salt-length prefix never yields the plaintext (password form)', async () => {
    const cipher = await crypt.encryptWithPassword(plain, 'pw', 16);

    for (let bit = 4 * 8; bit < cipher.length * 8; bit++) {
      const bad = cipher.slice();
      bad[bit >> 3] ^= 1 << (bit & 7);
      const out = await attempt(() => crypt.decryptWithPassword(bad, 'pw'));
      expect(out).not.toEqual(plain);
    }
  });

  it('a wrong password never yields the plaintext', async () => {
    const cipher = await crypt.encryptWithPassword(plain, 'right');
    const out = await attempt(() => crypt.decryptWithPassword(cipher, 'wrong'));
    expect(out).not.toEqual(plain);
  });

  it('a corrupted salt-length prefix is rejected as malformed', async () => {
    const cipher = await crypt.encryptWithPassword(plain, 'pw');
    cipher[0] = 33;
    await expect(crypt.decryptWithPassword(cipher, 'pw'))
      .rejects.toThrow('Invalid salt length 33; expected 16, 24 or 32');
  });
});
