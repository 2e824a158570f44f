// packages/core/src/codec/IvEmbeddingCodec.ts
import { IV_LENGTH } from '../config/defaults.js';
import { randomBytes, type CryptoProvider } from '../providers/CryptoProvider.js';
import type { StreamProcessor } from '../stream/StreamProcessor.js';
import type { ByteReader, ByteSink } from '../util/stream.js';
import { assertKey } from '../util/validate.js';

/**
 * Keyed form: `iv[16] || ciphertext`.
 *
 * A fresh IV is drawn from the provider on every encrypt, so the output can be
 * reversed with the key alone. Nothing authenticates the IV: a modified IV
 * silently changes the first plaintext block.
 */
export class IvEmbeddingCodec {
  constructor(
    private readonly provider : CryptoProvider,
    private readonly stream   : StreamProcessor,
  ) {}

  async encrypt(reader: ByteReader, sink: ByteSink, key: Uint8Array): Promise<void> {
    assertKey(key);
    const iv = randomBytes(this.provider, IV_LENGTH);
    await sink.write(iv);
    await this.stream.encrypt(reader, sink, key, iv);
  }

  async decrypt(reader: ByteReader, sink: ByteSink, key: Uint8Array): Promise<void> {
    assertKey(key);
    const iv = await reader.readExact(IV_LENGTH, 'IV');
    await this.stream.decrypt(reader, sink, key, iv);
  }
}
