import { cbc } from '@noble/ciphers/aes.js';
import { BLOCK_SIZE } from '../../../config/defaults.js';
import { MalformedEnvelopeError } from '../../../errors/index.js';
import type { CipherMode, PaddingScheme } from '../../../types/index.js';
import { concat, wipe } from '../../../util/bytes.js';
import { assertIv, assertKey } from '../../../util/validate.js';

/**
 * Incremental AES-CBC over `@noble/ciphers`.
 *
 * ## Chaining
 * CBC over `B1 || B2` equals CBC over `B1` followed by CBC over `B2` with the
 * last ciphertext block of `B1` as IV. Each {@link update} therefore runs a
 * fresh one-shot `cbc()` on the block-aligned part of the input and carries
 * the last ciphertext block forward in {@link chain}.
 *
 * ## Buffering
 * - encrypt: bytes past the last full block wait for the next update; {@link final}
 *   pads them into one last block.
 * - decrypt: the last complete block is always held back because only the final
 *   block carries padding; {@link final} decrypts and unpads it.
 *
 * ## Zeroization
 * The instance works on copies of key and IV; {@link dispose} wipes them together
 * with any buffered bytes. Call it on every exit path.
 */
export class AesCbcEngine {
  /** AES block size in bytes. */
  public static readonly BLOCK_SIZE = BLOCK_SIZE;

  private key     : Uint8Array;
  private chain   : Uint8Array;
  private pending : Uint8Array = new Uint8Array(0);
  private done    = false;

  /**
   * @param mode    - direction of the transform
   * @param key     - 16, 24 or 32 bytes (AES-128/192/256)
   * @param iv      - 16 bytes
   * @param padding - scheme applied to the final block
   * @param rng     - randomness for padding filler bytes
   * @throws {InvalidArgumentError} on a bad key or IV length
   */
  constructor(
    private readonly mode    : CipherMode,
    key                      : Uint8Array,
    iv                       : Uint8Array,
    private readonly padding : PaddingScheme,
    private readonly rng     : (n: number) => Uint8Array,
  ) {
    assertIv(iv);
    assertKey(key);
    // `new Uint8Array(x)` copies even when x is a Node Buffer
    this.key   = new Uint8Array(key);
    this.chain = new Uint8Array(iv);
  }

  /** Feed input; returns whatever output is already final (possibly empty). */
  update(data: Uint8Array): Uint8Array {
    this.requireOpen();
    const combined = this.pending.length ? concat(this.pending, data) : new Uint8Array(data);
    const len      = combined.length;

    let take = len - (len % BLOCK_SIZE);
    if (this.mode === 'decrypt' && take === len) take -= BLOCK_SIZE;

    if (take <= 0) {
      wipe(this.pending);
      this.pending = combined;
      return new Uint8Array(0);
    }

    const run    = combined.slice(0, take);
    wipe(this.pending);
    this.pending = combined.slice(take);
    wipe(combined);

    return this.process(run);
  }

  /**
   * Emit the final block.
   *
   * @throws {MalformedEnvelopeError} when decrypting an empty or non block-aligned ciphertext
   * @throws {DecryptionError} when the padding of the final block is invalid
   */
  final(): Uint8Array {
    this.requireOpen();
    this.done = true;

    if (this.mode === 'encrypt') {
      return this.process(this.padding.pad(this.pending, BLOCK_SIZE, this.rng));
    }

    if (this.pending.length === 0) {
      throw new MalformedEnvelopeError('Ciphertext is empty; expected at least one block');
    }
    if (this.pending.length !== BLOCK_SIZE) {
      throw new MalformedEnvelopeError('Ciphertext length is not a multiple of the block size');
    }

    const block = this.process(this.pending);
    try {
      return this.padding.unpad(block, BLOCK_SIZE);
    } finally {
      wipe(block);
    }
  }

  /** Wipe key, chaining block and buffered bytes; the instance is unusable afterwards. */
  dispose(): void {
    wipe(this.key, this.chain, this.pending);
    this.pending = new Uint8Array(0);
    this.done    = true;
  }

  private process(run: Uint8Array): Uint8Array {
    const cipher = cbc(this.key, this.chain, { disablePadding: true });
    const out    = this.mode === 'encrypt' ? cipher.encrypt(run) : cipher.decrypt(run);

    const lastCipherBlock = (this.mode === 'encrypt' ? out : run).slice(-BLOCK_SIZE);
    wipe(this.chain);
    this.chain = lastCipherBlock;

    if (this.mode === 'encrypt') wipe(run);
    return out;
  }

  private requireOpen(): void {
    if (this.done) throw new Error('Cipher already finalized');
  }
}
