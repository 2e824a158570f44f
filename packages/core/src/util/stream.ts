// packages/core/src/util/stream.ts
import { MalformedEnvelopeError } from '../errors/index.js';

/**
 * Pull-side capability the codecs share: every layer reads its own prefix
 * through the same instance, so bytes buffered by one layer are seen by the next.
 */
export class ByteReader {
  private buf   : Uint8Array = new Uint8Array(0);
  private eof   = false;
  private reader: ReadableStreamDefaultReader<Uint8Array> | null;

  constructor(source: ReadableStream<Uint8Array>) {
    this.reader = source.getReader();
  }

  /**
   * Read up to `max` bytes. Returns `null` once the source is exhausted.
   * The returned array is a fresh copy.
   */
  async read(max: number): Promise<Uint8Array | null> {
    if (!this.buf.byteLength) {
      const next = await this.pull();
      if (!next) return null;
      this.buf = next;
    }
    const out = new Uint8Array(this.buf.subarray(0, max));
    this.buf  = this.buf.subarray(out.byteLength);
    return out;
  }

  /**
   * Read exactly `n` bytes.
   * @throws {MalformedEnvelopeError} when the source ends first
   */
  async readExact(n: number, what: string): Promise<Uint8Array> {
    const out = new Uint8Array(n);
    let off = 0;
    while (off < n) {
      const part = await this.read(n - off);
      if (!part) {
        throw new MalformedEnvelopeError(
          `Truncated envelope: expected ${n} bytes of ${what}, got ${off}`,
        );
      }
      out.set(part, off);
      off += part.byteLength;
    }
    return out;
  }

  /** Give the source back to its owner. Never cancels it. */
  release(): void {
    if (!this.reader) return;
    this.reader.releaseLock();
    this.reader = null;
  }

  private async pull(): Promise<Uint8Array | null> {
    if (!this.reader) throw new Error('ByteReader already released');
    while (!this.eof) {
      const { done, value } = await this.reader.read();
      if (done) {
        this.eof = true;
        break;
      }
      if (value.byteLength) return value;
    }
    return null;
  }
}

/** Push-side capability: ordered, awaited writes into a caller-owned destination. */
export interface ByteSink {
  write(chunk: Uint8Array): Promise<void>;
}

export class WriterSink implements ByteSink {
  private writer: WritableStreamDefaultWriter<Uint8Array> | null;

  constructor(dest: WritableStream<Uint8Array>) {
    this.writer = dest.getWriter();
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (!this.writer) throw new Error('WriterSink already released');
    if (!chunk.byteLength) return;
    await this.writer.ready;
    await this.writer.write(chunk);
  }

  /** Give the destination back to its owner. Never closes it. */
  release(): void {
    if (!this.writer) return;
    this.writer.releaseLock();
    this.writer = null;
  }
}

/* ------------------------------------------------------------------ */
/*  In-memory endpoints                                                */
/* ------------------------------------------------------------------ */

/** A readable over a private copy of `data`. */
export function sourceFromBytes(data: Uint8Array): ReadableStream<Uint8Array> {
  const copy = new Uint8Array(data);
  return new ReadableStream<Uint8Array>({
    start(c) {
      if (copy.byteLength) c.enqueue(copy);
      c.close();
    },
  });
}

/** A writable that keeps everything written to it. */
export function memorySink(): { stream: WritableStream<Uint8Array>; bytes(): Uint8Array } {
  const chunks: Uint8Array[] = [];
  return {
    stream: new WritableStream<Uint8Array>({
      write(chunk) { chunks.push(chunk); },
    }),
    bytes: () => {
      const out = new Uint8Array(chunks.reduce((n, c) => n + c.byteLength, 0));
      let offset = 0;
      for (const c of chunks) {
        out.set(c, offset);
        offset += c.byteLength;
      }
      return out;
    },
  };
}
