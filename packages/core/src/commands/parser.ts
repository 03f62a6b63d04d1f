import type { DiagnosticCommand } from '../types.js';

export function parseCommand(input: string): DiagnosticCommand {
  switch (input.trim()) {
    case 'run':
      return 'run';
    case 'clear':
      return 'clear';
    default:
      return 'unknown';
  }
}
