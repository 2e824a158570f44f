// packages/core/src/stream/StreamProcessor.ts
import { AesCbcEngine } from '../algorithms/encryption/aes-cbc/AESCBC.js';
import { Iso10126Padding } from '../algorithms/padding/iso10126.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { randomBytes, type CryptoProvider } from '../providers/CryptoProvider.js';
import type { CipherMode, PaddingScheme } from '../types/index.js';
import type { Logger } from '../util/logger.js';
import type { ByteReader, ByteSink } from '../util/stream.js';

/**
 * Drives the block cipher over a reader/sink pair:
 * read `chunkSize` bytes → transform → write, until the source ends, then
 * write the padded final block.
 */
export class StreamProcessor {
  constructor(
    private readonly provider : CryptoProvider,
    private readonly chunkSize: number = DEFAULT_CHUNK_SIZE,
    private readonly padding  : PaddingScheme = new Iso10126Padding(),
    private readonly log?     : Logger,
  ) {}

  encrypt(reader: ByteReader, sink: ByteSink, key: Uint8Array, iv: Uint8Array): Promise<void> {
    return this.run('encrypt', reader, sink, key, iv);
  }

  decrypt(reader: ByteReader, sink: ByteSink, key: Uint8Array, iv: Uint8Array): Promise<void> {
    return this.run('decrypt', reader, sink, key, iv);
  }

  getChunkSize(): number { return this.chunkSize; }

  private async run(
    mode   : CipherMode,
    reader : ByteReader,
    sink   : ByteSink,
    key    : Uint8Array,
    iv     : Uint8Array,
  ): Promise<void> {
    // validates key and IV before anything is read or written
    const engine = new AesCbcEngine(
      mode, key, iv, this.padding, n => randomBytes(this.provider, n),
    );

    let inBytes = 0;
    try {
      for (;;) {
        const chunk = await reader.read(this.chunkSize);
        if (chunk === null) break;
        inBytes += chunk.byteLength;
        await sink.write(engine.update(chunk));
      }
      await sink.write(engine.final());
      this.log?.log(4, `${mode}: ${inBytes} bytes through AES-${key.length * 8}-CBC, ${this.padding.name} padding`);
    } finally {
      engine.dispose();
    }
  }
}
