import { bytesEqual } from '../crypto/hex.js';
import type { DiagnosticVerdict } from '../types.js';

export function classifySharedSecret(
  shared: Uint8Array,
  localPublic: Uint8Array,
  remotePublic: Uint8Array
): DiagnosticVerdict {
  if (bytesEqual(shared, remotePublic)) return 'matches-remote-public';
  if (bytesEqual(shared, localPublic)) return 'matches-local-public';
  return 'distinct';
}

export function verdictStatusLine(verdict: DiagnosticVerdict): string {
  switch (verdict) {
    case 'matches-remote-public':
      return 'BUG: shared == peer_pub!';
    case 'matches-local-public':
      return 'BUG: shared == our_pub!';
    case 'distinct':
      return 'OK: shared != any pubkey';
  }
}

export function isBugVerdict(verdict: DiagnosticVerdict): boolean {
  return verdict !== 'distinct';
}
