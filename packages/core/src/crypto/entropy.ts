import { randomBytes } from '@noble/ciphers/webcrypto';
import type { EntropySource } from '../types.js';

export class EntropyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EntropyError';
  }
}

export function createWebCryptoEntropy(): EntropySource {
  if (typeof globalThis.crypto?.getRandomValues !== 'function') {
    throw new EntropyError('crypto.getRandomValues is not available');
  }
  return {
    fill(buffer: Uint8Array): void {
      buffer.set(randomBytes(buffer.length));
    },
  };
}
