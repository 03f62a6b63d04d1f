import { x25519 } from '@noble/curves/ed25519';
import { EntropyError } from './entropy.js';
import type { CurvePrimitive, EntropySource, KeyPair } from '../types.js';

export const KEY_LENGTH = 32;

export const x25519Curve: CurvePrimitive = {
  derivePublic(secret: Uint8Array): Uint8Array {
    return x25519.getPublicKey(secret);
  },
  diffieHellman(secret: Uint8Array, peerPublic: Uint8Array): Uint8Array {
    return x25519.getSharedSecret(secret, peerPublic);
  },
};

export class KeyPairGenerator {
  constructor(
    private entropy: EntropySource,
    private curve: CurvePrimitive = x25519Curve
  ) {}

  generate(): KeyPair {
    const secret = new Uint8Array(KEY_LENGTH);
    try {
      this.entropy.fill(secret);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new EntropyError(`entropy source failed: ${reason}`);
    }
    return { secret, public: this.curve.derivePublic(secret) };
  }
}
