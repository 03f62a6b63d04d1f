import { EntropyError } from '../crypto/entropy.js';
import { bytesEqual, formatHex, formatHexWrapped } from '../crypto/hex.js';
import { KeyPairGenerator, x25519Curve } from '../crypto/x25519.js';
import { classifySharedSecret, verdictStatusLine } from './verdict.js';
import type { MessageLog } from '../log/message-log.js';
import type {
  CurvePrimitive,
  DiagnosticLogSink,
  DiagnosticReport,
  EntropySource,
} from '../types.js';

/**
 * Runs one local/remote X25519 exchange and reports whether the shared
 * secret collapsed onto either public key. Every step is echoed to the
 * on-screen log and, in more detail, to the diagnostic sink.
 */
export class DiagnosticEngine {
  private keys: KeyPairGenerator;

  constructor(
    private log: MessageLog,
    private sink: DiagnosticLogSink,
    entropy: EntropySource,
    private curve: CurvePrimitive = x25519Curve
  ) {
    this.keys = new KeyPairGenerator(entropy, curve);
  }

  run(): DiagnosticReport {
    const trace: string[] = [];
    const emit = (line: string) => {
      trace.push(line);
      this.log.append(line);
    };

    this.sink.info('=== STARTING ECDH TEST ===');
    emit('=== ECDH TEST ===');

    emit('1. Generating our keypair...');
    const local = this.keys.generate();
    this.sink.info(`Our private key: ${formatHexWrapped(local.secret)}`);
    this.sink.info(`Our public key: ${formatHexWrapped(local.public)}`);
    emit(`Our priv: ${formatHex(local.secret)}`);
    emit(`Our pub:  ${formatHex(local.public)}`);

    emit('2. Generating peer keypair...');
    const remote = this.keys.generate();
    if (bytesEqual(remote.secret, local.secret)) {
      throw new EntropyError('entropy source returned the same 32 bytes twice');
    }
    this.sink.info(`Peer private key: ${formatHexWrapped(remote.secret)}`);
    this.sink.info(`Peer public key: ${formatHexWrapped(remote.public)}`);
    emit(`Peer pub: ${formatHex(remote.public)}`);

    emit('3. Computing ECDH...');
    this.sink.info('Computing ECDH: our secret x peer public');
    this.sink.info(`  Input private: ${formatHexWrapped(local.secret)}`);
    this.sink.info(`  Input public:  ${formatHexWrapped(remote.public)}`);
    const shared = this.curve.diffieHellman(local.secret, remote.public);
    this.sink.info(`  Output shared: ${formatHexWrapped(shared)}`);
    emit(`Shared:   ${formatHex(shared)}`);

    emit('4. Checking results...');
    const verdict = classifySharedSecret(shared, local.public, remote.public);
    emit(verdictStatusLine(verdict));
    switch (verdict) {
      case 'matches-remote-public':
        this.sink.warn('Shared secret equals peer public key!');
        break;
      case 'matches-local-public':
        this.sink.warn('Shared secret equals our public key!');
        break;
      case 'distinct':
        this.sink.info('ECDH output looks correct');
        break;
    }

    this.sink.info('=== ECDH TEST COMPLETE ===');
    emit('=== TEST COMPLETE ===');

    return { local, remote, shared, verdict, trace };
  }
}
