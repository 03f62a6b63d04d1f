import type { LogEntry } from '../types.js';

export const LOG_CAPACITY = 20;
export const MAX_ENTRY_LENGTH = 512;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

// Cuts at MAX_ENTRY_LENGTH code units without splitting a surrogate pair.
export function truncateEntry(text: string): string {
  if (text.length <= MAX_ENTRY_LENGTH) return text;
  const cut = text.slice(0, MAX_ENTRY_LENGTH);
  return isHighSurrogate(cut.charCodeAt(cut.length - 1)) ? cut.slice(0, -1) : cut;
}

export interface ReadonlyMessageLog {
  readonly size: number;
  newestFirst(): Iterable<LogEntry>;
}

/**
 * Fixed-capacity transcript. Entries are kept oldest first; appending to a
 * full log drops the single oldest entry.
 */
export class MessageLog implements ReadonlyMessageLog {
  private readonly slots: Array<LogEntry | undefined>;
  private head = 0; // index of the oldest entry
  private count = 0;
  private nextId = 0;

  constructor(readonly capacity = LOG_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`MessageLog capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<LogEntry | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  append(text: string): LogEntry {
    const entry: LogEntry = Object.freeze({
      id: this.nextId++,
      text: truncateEntry(text),
    });

    if (this.count === this.capacity) {
      this.slots[this.head] = entry;
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.slots[(this.head + this.count) % this.capacity] = entry;
      this.count++;
    }
    return entry;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  *newestFirst(): IterableIterator<LogEntry> {
    for (let i = this.count - 1; i >= 0; i--) {
      yield this.at(i);
    }
  }

  entries(): LogEntry[] {
    const out: LogEntry[] = [];
    for (let i = 0; i < this.count; i++) out.push(this.at(i));
    return out;
  }

  texts(): string[] {
    return this.entries().map(e => e.text);
  }

  private at(offset: number): LogEntry {
    const entry = this.slots[(this.head + offset) % this.capacity];
    if (!entry) throw new Error(`MessageLog slot ${offset} is empty`);
    return entry;
  }
}
