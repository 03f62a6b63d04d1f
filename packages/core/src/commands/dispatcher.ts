import { parseCommand } from './parser.js';
import type { DiagnosticEngine } from '../diagnostic/engine.js';
import type { MessageLog } from '../log/message-log.js';
import type { CommandResult, DiagnosticLogSink } from '../types.js';

export const HELP_TEXT = "Type 'run' to test ECDH";
export const CLEARED_TEXT = 'Screen cleared';

export class CommandDispatcher {
  constructor(
    private log: MessageLog,
    private engine: DiagnosticEngine,
    private sink: DiagnosticLogSink
  ) {}

  dispatch(raw: string): CommandResult {
    this.log.append(`>${raw}`);

    const command = parseCommand(raw);
    switch (command) {
      case 'run':
        return this.handleRun();
      case 'clear':
        this.log.clear();
        this.log.append(CLEARED_TEXT);
        return { command };
      case 'unknown':
        this.log.append(HELP_TEXT);
        return { command };
    }
  }

  private handleRun(): CommandResult {
    try {
      return { command: 'run', report: this.engine.run() };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.sink.error(`Diagnostic run aborted: ${message}`);
      this.log.append(`ERROR: ${message}`);
      return { command: 'run', error: message };
    }
  }
}
