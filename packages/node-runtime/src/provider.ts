import { randomFillSync } from 'node:crypto';
import type { CryptoProvider } from '../../core/src/providers/CryptoProvider.js';

export const nodeProvider: CryptoProvider = {
  getRandomValues(buf) {
    randomFillSync(buf);
    return buf;
  },
};
