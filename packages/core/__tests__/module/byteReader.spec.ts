import { MalformedEnvelopeError } from '../../src/errors/index.js';
import { ByteReader, WriterSink, memorySink, sourceFromBytes } from '../../src/util/stream.js';
import { recordingSink } from '../_helper.js';

function source(...chunks: number[][]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(c) {
      for (const ch of chunks) c.enqueue(new Uint8Array(ch));
      c.close();
    },
  });
}

describe('ByteReader', () => {
  it('hands out at most max bytes, one source chunk at a time', async () => {
    const r = new ByteReader(source([1, 2, 3], [4, 5]));
    expect([...(await r.read(2)) ?? []]).toEqual([1, 2]);
    expect([...(await r.read(5)) ?? []]).toEqual([3]);
    expect([...(await r.read(5)) ?? []]).toEqual([4, 5]);
    expect(await r.read(5)).toBeNull();
  });

  it('skips empty chunks', async () => {
    const r = new ByteReader(source([], [7], []));
    expect([...(await r.read(4)) ?? []]).toEqual([7]);
    expect(await r.read(4)).toBeNull();
  });

  it('readExact spans chunks and leaves the rest for the next reader call', async () => {
    const r = new ByteReader(source([1, 2, 3], [4, 5]));
    expect([...await r.readExact(4, 'IV')]).toEqual([1, 2, 3, 4]);
    expect([...(await r.read(10)) ?? []]).toEqual([5]);
  });

  it('readExact past the end → MalformedEnvelopeError', async () => {
    const r = new ByteReader(source([1, 2, 3], [4, 5]));
    const err = r.readExact(8, 'IV');
    await expect(err).rejects.toThrow(MalformedEnvelopeError);
    await expect(err).rejects.toThrow('Truncated envelope: expected 8 bytes of IV, got 5');
  });

  it('returns copies', async () => {
    const chunk = new Uint8Array([1, 2, 3]);
    const r = new ByteReader(new ReadableStream<Uint8Array>({ start(c) { c.enqueue(chunk); c.close(); } }));
    const got = await r.read(3);
    got?.fill(0);
    expect([...chunk]).toEqual([1, 2, 3]);
  });

  it('release hands the source back without cancelling it', async () => {
    const rs = source([1], [2]);
    const r  = new ByteReader(rs);
    await r.read(1);
    r.release();
    expect(rs.locked).toBe(false);

    const again = rs.getReader();
    const next  = await again.read();
    expect(next.done).toBe(false);
    expect([...next.value ?? []]).toEqual([2]);
  });
});

describe('WriterSink', () => {
  it('drops empty writes and never closes the destination', async () => {
    const out  = recordingSink();
    const sink = new WriterSink(out.stream);
    await sink.write(new Uint8Array(0));
    await sink.write(new Uint8Array([1]));
    sink.release();

    expect(out.writes).toEqual([new Uint8Array([1])]);
    expect(out.state.closed).toBe(false);
    expect(out.stream.locked).toBe(false);
  });
});

describe('in-memory endpoints', () => {
  it('sourceFromBytes copies its input', async () => {
    const data = new Uint8Array([9, 8, 7]);
    const rs   = sourceFromBytes(data);
    data.fill(0);
    const r = new ByteReader(rs);
    expect([...await r.readExact(3, 'data')]).toEqual([9, 8, 7]);
  });

  it('sourceFromBytes of nothing ends at once', async () => {
    expect(await new ByteReader(sourceFromBytes(new Uint8Array(0))).read(1)).toBeNull();
  });

  it('memorySink concatenates', async () => {
    const m = memorySink();
    const w = m.stream.getWriter();
    await w.write(new Uint8Array([1, 2]));
    await w.write(new Uint8Array([3]));
    w.releaseLock();
    expect([...m.bytes()]).toEqual([1, 2, 3]);
  });
});
