// packages/node-runtime/src/index.ts
import { AesEnvelope, type AesEnvelopeOptions } from '../../core/src/index.js';
import { nodeProvider }                         from './provider.js';

export function createEnvelope(cfg?: AesEnvelopeOptions): AesEnvelope {
  return new AesEnvelope(nodeProvider, cfg);
}

export * from '../../core/src/index.js';
export { nodeProvider } from './provider.js';
export { toWebReadable, toWebWritable } from './streamAdapter.js';
