import { EventEmitter } from 'events';
import { createWebCryptoEntropy } from './crypto/entropy.js';
import { x25519Curve } from './crypto/x25519.js';
import { DiagnosticEngine } from './diagnostic/engine.js';
import { CommandDispatcher, HELP_TEXT } from './commands/dispatcher.js';
import { MessageLog, LOG_CAPACITY } from './log/message-log.js';
import { FileLogSink } from './log/sinks.js';
import { DEFAULT_METRICS } from './render/layout.js';
import { redraw } from './render/redraw.js';
import type {
  CommandResult,
  CurvePrimitive,
  DiagnosticLogSink,
  EntropySource,
  LayoutMetrics,
  RenderSurface,
  SessionEvent,
  SessionState,
  Viewport,
} from './types.js';

export const APP_VERSION = '0.1.0';

export interface DiagnosticSessionConfig {
  sink?: DiagnosticLogSink;
  entropy?: EntropySource;
  curve?: CurvePrimitive;
  surface?: RenderSurface;
  viewport?: Viewport;
  metrics?: LayoutMetrics;
  capacity?: number;
}

/**
 * State owned by the host's event loop. The host feeds it one event at a
 * time; nothing here runs concurrently.
 *
 * Emits `verdict` (DiagnosticVerdict), `cleared`, `redrawn` (line count)
 * and `quit`.
 */
export class DiagnosticSession extends EventEmitter {
  readonly log: MessageLog;
  private sink: DiagnosticLogSink;
  private dispatcher: CommandDispatcher;
  private surface: RenderSurface | undefined;
  private metrics: LayoutMetrics;
  private viewport: Viewport;
  private runs = 0;

  constructor(config: DiagnosticSessionConfig = {}) {
    super();
    this.sink = config.sink ?? new FileLogSink();
    this.log = new MessageLog(config.capacity ?? LOG_CAPACITY);
    this.surface = config.surface;
    this.metrics = config.metrics ?? DEFAULT_METRICS;
    this.viewport = config.viewport ?? { width: 0, height: 0 };

    const engine = new DiagnosticEngine(
      this.log,
      this.sink,
      config.entropy ?? createWebCryptoEntropy(),
      config.curve ?? x25519Curve
    );
    this.dispatcher = new CommandDispatcher(this.log, engine, this.sink);
  }

  start(): void {
    this.sink.info('ECDH Probe starting...');
    this.log.append(`ECDH Probe v${APP_VERSION}`);
    this.log.append(HELP_TEXT);
    this.redraw();
    this.sink.info('ECDH Probe ready');
  }

  handleEvent(event: SessionEvent): SessionState {
    switch (event.type) {
      case 'redraw':
        if (event.viewport) this.viewport = event.viewport;
        this.redraw();
        return 'continue';
      case 'line':
        this.sink.info(`Received input: ${event.text}`);
        this.dispatch(event.text);
        this.redraw();
        return 'continue';
      case 'focus-change':
        this.sink.debug(`Focus changed: ${event.focused ? 'focused' : 'background'}`);
        return 'continue';
      case 'quit':
        this.sink.info('Quit requested, exiting');
        this.emit('quit');
        return 'quit';
    }
  }

  dispatch(raw: string): CommandResult {
    const result = this.dispatcher.dispatch(raw);
    if (result.command === 'clear') this.emit('cleared');
    if (result.report) {
      this.runs++;
      this.emit('verdict', result.report.verdict);
    }
    return result;
  }

  getRunCount(): number {
    return this.runs;
  }

  getViewport(): Viewport {
    return { ...this.viewport };
  }

  private redraw(): void {
    if (!this.surface) return;
    const lines = redraw(this.surface, this.viewport, this.log, this.sink, this.metrics);
    this.emit('redrawn', lines);
  }
}
