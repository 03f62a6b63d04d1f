import fs from 'fs';
import os from 'os';
import path from 'path';
import type { DiagnosticLogSink, LogLevel } from '../types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogRecord {
  level: LogLevel;
  message: string;
  timestamp: number;
}

export function formatLogLine(record: LogRecord): string {
  return `${new Date(record.timestamp).toISOString()} ${record.level.toUpperCase()} ${record.message}`;
}

abstract class LeveledSink implements DiagnosticLogSink {
  constructor(private minLevel: LogLevel = 'info') {}

  protected abstract write(record: LogRecord): void;

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    this.write({ level, message, timestamp: Date.now() });
  }
}

export function getDataDir(): string {
  const dir = path.join(os.homedir(), '.ecdh-probe');
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return dir;
}

export class FileLogSink extends LeveledSink {
  readonly path: string;

  constructor(filePath?: string, minLevel?: LogLevel) {
    super(minLevel);
    this.path = filePath ?? path.join(getDataDir(), 'diagnostic.log');
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
  }

  protected write(record: LogRecord): void {
    fs.appendFileSync(this.path, formatLogLine(record) + '\n');
  }
}

export class ConsoleLogSink extends LeveledSink {
  protected write(record: LogRecord): void {
    console.error(formatLogLine(record));
  }
}

export class MemoryLogSink extends LeveledSink {
  readonly records: LogRecord[] = [];

  constructor(minLevel: LogLevel = 'debug') {
    super(minLevel);
  }

  protected write(record: LogRecord): void {
    this.records.push(record);
  }

  messages(level?: LogLevel): string[] {
    return this.records
      .filter(r => level === undefined || r.level === level)
      .map(r => r.message);
  }
}
