import { describe, it, expect } from 'vitest';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { DiagnosticSession, MemoryLogSink } from '@ecdh-probe/core';
import type { CurvePrimitive, EntropySource } from '@ecdh-probe/core';
import { parseOptions } from '../options.js';
import { runOnce, EXIT_OK, EXIT_ABORTED, EXIT_BUG_FOUND } from '../headless.js';

function counterEntropy(): EntropySource {
  let draw = 0;
  return {
    fill(buffer: Uint8Array): void {
      draw++;
      buffer.forEach((_, i) => { buffer[i] = (draw * 13 + i) & 0xff; });
    },
  };
}

const echoesPeerCurve: CurvePrimitive = {
  derivePublic: secret => secret.map(b => b ^ 0x55),
  diffieHellman: (_secret, peerPublic) => peerPublic.slice(),
};

describe('parseOptions', () => {
  it('should read flags', () => {
    expect(parseOptions(['--once', '--log', '/tmp/probe.log', '--verbose'])).toEqual({
      logPath: '/tmp/probe.log',
      verbose: true,
      once: true,
    });
  });

  it('should default everything off', () => {
    expect(parseOptions([])).toEqual({ logPath: undefined, verbose: false, once: false });
  });

  it('should ignore a trailing --log without a value', () => {
    expect(parseOptions(['--log']).logPath).toBeUndefined();
  });
});

describe('runOnce', () => {
  it('should print the transcript and exit cleanly for a correct exchange', () => {
    const session = new DiagnosticSession({ sink: new MemoryLogSink(), entropy: counterEntropy() });
    const lines: string[] = [];
    const code = runOnce(session, line => lines.push(line));

    expect(code).toBe(EXIT_OK);
    expect(lines).toHaveLength(12);
    expect(lines[0]).toBe('>run');
    expect(lines[10]).toBe('OK: shared != any pubkey');
  });

  it('should exit with the bug code when the secret matches a public key', () => {
    const session = new DiagnosticSession({
      sink: new MemoryLogSink(),
      entropy: counterEntropy(),
      curve: echoesPeerCurve,
    });
    const lines: string[] = [];
    expect(runOnce(session, line => lines.push(line))).toBe(EXIT_BUG_FOUND);
    expect(lines[10]).toBe('BUG: shared == peer_pub!');
  });

  it('should exit with the abort code when entropy fails', () => {
    const session = new DiagnosticSession({
      sink: new MemoryLogSink(),
      entropy: {
        fill() {
          throw new Error('boom');
        },
      },
    });
    const lines: string[] = [];
    expect(runOnce(session, line => lines.push(line))).toBe(EXIT_ABORTED);
    expect(lines[lines.length - 1]).toBe('ERROR: entropy source failed: boom');
  });
});

describe('package entry points', () => {
  it('should launch the CLI from its TypeScript sources only', () => {
    const manifestPath = fileURLToPath(new URL('../../../../package.json', import.meta.url));
    const manifest = JSON.parse(fs.readFileSync(manifestPath, 'utf8')) as {
      bin?: unknown;
      scripts: Record<string, string>;
    };
    expect(manifest.bin).toBeUndefined();
    expect(manifest.scripts.start).toBe('tsx packages/cli/src/index.ts');
  });
});
