export interface KeyPair {
  secret: Uint8Array; // 32 bytes
  public: Uint8Array; // 32 bytes
}

export type DiagnosticVerdict =
  | 'matches-remote-public'
  | 'matches-local-public'
  | 'distinct';

export interface DiagnosticReport {
  local: KeyPair;
  remote: KeyPair;
  shared: Uint8Array;
  verdict: DiagnosticVerdict;
  trace: string[];
}

export interface LogEntry {
  readonly id: number;
  readonly text: string;
}

export interface Viewport {
  width: number;
  height: number;
}

export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface LayoutLine {
  text: string;
  box: Rect;
}

export interface LayoutMetrics {
  margin: number;
  lineHeight: number;
}

export type GlyphStyle = 'small' | 'regular';

export interface EntropySource {
  fill(buffer: Uint8Array): void;
}

export interface CurvePrimitive {
  derivePublic(secret: Uint8Array): Uint8Array;
  diffieHellman(secret: Uint8Array, peerPublic: Uint8Array): Uint8Array;
}

export interface RenderSurface {
  clear(rect: Rect): void;
  postText(text: string, bounds: Rect, style: GlyphStyle): void;
  present(): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DiagnosticLogSink {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type DiagnosticCommand = 'run' | 'clear' | 'unknown';

export interface CommandResult {
  command: DiagnosticCommand;
  report?: DiagnosticReport;
  error?: string;
}

export type SessionEvent =
  | { type: 'redraw'; viewport?: Viewport }
  | { type: 'line'; text: string }
  | { type: 'focus-change'; focused: boolean }
  | { type: 'quit' };

export type SessionState = 'continue' | 'quit';
