const BYTES_PER_LOG_LINE = 16;

function byteToHex(b: number): string {
  return b.toString(16).padStart(2, '0');
}

/** `de ad be ef ` — each byte followed by a single space. */
export function formatHex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += `${byteToHex(b)} `;
  return out;
}

/** Same as {@link formatHex}, broken onto a new line every 16 bytes. */
export function formatHexWrapped(bytes: Uint8Array): string {
  let out = '';
  bytes.forEach((b, i) => {
    if (i > 0 && i % BYTES_PER_LOG_LINE === 0) out += '\n';
    out += `${byteToHex(b)} `;
  });
  return out;
}

// Not constant-time.
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
