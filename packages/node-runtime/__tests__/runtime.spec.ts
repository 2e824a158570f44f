import { Readable } from 'node:stream';
import { createEnvelope, nodeProvider, toWebReadable, toWebWritable, AesEnvelope } from '../src/index.js';
import { capture } from './_io.js';

describe('node runtime', () => {
  it('nodeProvider fills the buffer it is given', () => {
    const buf = new Uint8Array(64);
    expect(nodeProvider.getRandomValues(buf)).toBe(buf);
    expect(buf.some(b => b !== 0)).toBe(true);
  });

  it('createEnvelope wires the Node provider', async () => {
    const env = createEnvelope({ chunkSize: 1024 });
    expect(env).toBeInstanceOf(AesEnvelope);
    expect(env.getChunkSize()).toBe(1024);

    const key = new Uint8Array(16).fill(3);
    const cipher = await env.encryptWithKey(new Uint8Array([1, 2, 3]), key);
    expect([...await env.decryptWithKey(cipher, key)]).toEqual([1, 2, 3]);
  });

  it('adapts Node streams for the streaming API', async () => {
    const env  = createEnvelope();
    const key  = new Uint8Array(32).fill(9);
    const data = Buffer.from('node streams in, node streams out');

    const encOut = capture();

    await env.encryptStreamWithKey(toWebReadable(Readable.from([data])), toWebWritable(encOut.stream), key);
    const cipher = encOut.bytes();
    expect(cipher.length).toBe(16 + 48);

    const plain = await env.decryptWithKey(new Uint8Array(cipher), key);
    expect(Buffer.from(plain).toString('utf8')).toBe('node streams in, node streams out');
  });
});
