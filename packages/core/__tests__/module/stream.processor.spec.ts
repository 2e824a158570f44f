import { createDecipheriv } from 'node:crypto';
import { StreamProcessor } from '../../src/stream/StreamProcessor.js';
import { InvalidArgumentError } from '../../src/errors/index.js';
import { createLogger } from '../../src/util/logger.js';
import { ByteReader, WriterSink } from '../../src/util/stream.js';
import { chunkedSource, counterProvider, pattern, recordingSink } from '../_helper.js';

async function run(
  sp: StreamProcessor,
  mode: 'encrypt' | 'decrypt',
  input: ReadableStream<Uint8Array>,
  key: Uint8Array,
  iv: Uint8Array,
) {
  const out    = recordingSink();
  const reader = new ByteReader(input);
  const sink   = new WriterSink(out.stream);
  try {
    await sp[mode](reader, sink, key, iv);
  } finally {
    reader.release();
    sink.release();
  }
  return out;
}

describe('StreamProcessor', () => {
  const key = pattern(32, 3);
  const iv  = pattern(16, 99);

  it('writes block-aligned output as it reads', async () => {
    const sp    = new StreamProcessor(counterProvider(), 5);
    const plain = pattern(70);
    const out   = await run(sp, 'encrypt', chunkedSource(plain, [70]), key, iv);

    expect(out.writes.length).toBeGreaterThan(1);
    for (const w of out.writes) expect(w.length % 16).toBe(0);

    const d = createDecipheriv('aes-256-cbc', key, iv);
    d.setAutoPadding(false);
    const padded = Buffer.concat([d.update(out.bytes()), d.final()]);
    expect(padded.length).toBe(80);
    expect(new Uint8Array(padded.subarray(0, 70))).toEqual(plain);
    expect(padded[79]).toBe(10);
  });

  it('round-trips with any chunk size', async () => {
    const plain = pattern(333);
    for (const chunk of [1, 16, 17, 4096]) {
      const sp     = new StreamProcessor(counterProvider(), chunk);
      const cipher = (await run(sp, 'encrypt', chunkedSource(plain, [100, 3]), key, iv)).bytes();
      const back   = (await run(sp, 'decrypt', chunkedSource(cipher, [7]), key, iv)).bytes();
      expect(back).toEqual(plain);
    }
  });

  it.each([
    ['15-byte key', 15, 16],
    ['20-byte key', 20, 16],
    ['17-byte IV',  32, 17],
  ])('%s → InvalidArgumentError before any I/O', async (_, keyLen, ivLen) => {
    const sp     = new StreamProcessor(counterProvider());
    const out    = recordingSink();
    const reader = new ByteReader(chunkedSource(pattern(40), []));
    const sink   = new WriterSink(out.stream);

    await expect(
      sp.encrypt(reader, sink, new Uint8Array(keyLen), new Uint8Array(ivLen)),
    ).rejects.toThrow(InvalidArgumentError);
    expect(out.writes).toEqual([]);

    // nothing was consumed
    expect(await reader.readExact(40, 'plaintext')).toEqual(pattern(40));
  });

  it('traces byte counts at level 4', async () => {
    const lines: string[] = [];
    const sp = new StreamProcessor(counterProvider(), 16, undefined, createLogger(4, m => lines.push(m)));
    await run(sp, 'encrypt', chunkedSource(pattern(40), []), key, iv);
    expect(lines).toEqual(['4| encrypt: 40 bytes through AES-256-CBC, iso10126 padding']);
  });

  it('exposes its chunk size', () => {
    expect(new StreamProcessor(counterProvider(), 1024).getChunkSize()).toBe(1024);
  });
});
