/**
 * algorithms/padding/iso10126.ts
 *
 * ISO 10126 block padding.
 *
 * Final block layout:
 *   TAIL(r) || RND[(k-1) bytes] || LEN(1 = k)
 *
 * Where:
 *   - r = len(plain) % blockSize, k = blockSize - r, so 1 ≤ k ≤ blockSize
 *   - a block-aligned plaintext (r = 0) gains one whole padding block
 *   - only LEN is checked on removal; the filler bytes are random and carry
 *     no structure
 *
 * Example:
 *   const padder = new Iso10126Padding();
 *   const rng = (n: number) => crypto.getRandomValues(new Uint8Array(n));
 *   const block = padder.pad(new Uint8Array([1,2,3]), 16, rng); // 16 bytes, block[15] === 13
 *   padder.unpad(block, 16);                                   // Uint8Array [1,2,3]
 */
import { DecryptionError } from '../../errors/index.js';
import type { PaddingScheme } from '../../types/index.js';

export class Iso10126Padding implements PaddingScheme {
  readonly name = 'iso10126';

  /**
   * Pad the trailing partial block.
   *
   * @param tail  Bytes after the last full block (`0 ≤ tail.length < blockSize`); not modified.
   * @param rng   CSPRNG returning exactly `n` bytes.
   * @returns A new block of exactly `blockSize` bytes.
   */
  pad(tail: Uint8Array, blockSize: number, rng: (n: number) => Uint8Array): Uint8Array {
    if (!Number.isInteger(blockSize) || blockSize < 1 || blockSize > 0xff) {
      throw new RangeError('blockSize must be 1..255');
    }
    if (tail.length >= blockSize) {
      throw new RangeError(`Tail (${tail.length} B) must be shorter than one block`);
    }

    const k   = blockSize - tail.length;
    const out = new Uint8Array(blockSize);
    out.set(tail, 0);

    if (k > 1) {
      const rnd = rng(k - 1);
      if (rnd.length !== k - 1) throw new RangeError('rng returned wrong length');
      out.set(rnd, tail.length);
    }
    out[blockSize - 1] = k;
    return out;
  }

  /**
   * Remove padding from the decrypted final block.
   *
   * @throws {DecryptionError} when LEN is 0 or exceeds the block size
   *   (wrong key, wrong IV or corrupted ciphertext).
   */
  unpad(lastBlock: Uint8Array, blockSize: number): Uint8Array {
    if (lastBlock.length !== blockSize) {
      throw new DecryptionError('Final block has the wrong size');
    }
    const k = lastBlock[blockSize - 1];
    if (k < 1 || k > blockSize) {
      throw new DecryptionError('Padding is invalid and cannot be removed');
    }
    return new Uint8Array(lastBlock.subarray(0, blockSize - k));
  }
}
