export { DiagnosticSession, APP_VERSION } from './session.js';
export type { DiagnosticSessionConfig } from './session.js';

// Types
export type {
  KeyPair,
  DiagnosticVerdict,
  DiagnosticReport,
  LogEntry,
  Viewport,
  Rect,
  LayoutLine,
  LayoutMetrics,
  GlyphStyle,
  EntropySource,
  CurvePrimitive,
  RenderSurface,
  LogLevel,
  DiagnosticLogSink,
  DiagnosticCommand,
  CommandResult,
  SessionEvent,
  SessionState,
} from './types.js';

// Crypto
export { EntropyError, createWebCryptoEntropy } from './crypto/entropy.js';
export { KeyPairGenerator, x25519Curve, KEY_LENGTH } from './crypto/x25519.js';
export { formatHex, formatHexWrapped, bytesEqual } from './crypto/hex.js';

// Diagnostic
export { DiagnosticEngine } from './diagnostic/engine.js';
export {
  classifySharedSecret,
  verdictStatusLine,
  isBugVerdict,
} from './diagnostic/verdict.js';

// Commands
export { parseCommand } from './commands/parser.js';
export { CommandDispatcher, HELP_TEXT, CLEARED_TEXT } from './commands/dispatcher.js';

// Log
export { MessageLog, LOG_CAPACITY, MAX_ENTRY_LENGTH, truncateEntry } from './log/message-log.js';
export type { ReadonlyMessageLog } from './log/message-log.js';
export {
  FileLogSink,
  ConsoleLogSink,
  MemoryLogSink,
  formatLogLine,
  getDataDir,
} from './log/sinks.js';
export type { LogRecord } from './log/sinks.js';

// Render
export { layout, DEFAULT_METRICS } from './render/layout.js';
export { redraw } from './render/redraw.js';
