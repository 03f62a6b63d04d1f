import type { EntropySource, GlyphStyle, Rect, RenderSurface } from '../types.js';

/** Deterministic, never-repeating byte source for tests. */
export function counterEntropy(): EntropySource {
  let draw = 0;
  return {
    fill(buffer: Uint8Array): void {
      draw++;
      for (let i = 0; i < buffer.length; i++) {
        buffer[i] = (draw * 31 + i) & 0xff;
      }
    },
  };
}

export function constantEntropy(value: number): EntropySource {
  return {
    fill(buffer: Uint8Array): void {
      buffer.fill(value);
    },
  };
}

export interface DrawCall {
  op: 'clear' | 'text' | 'present';
  text?: string;
  rect?: Rect;
  style?: GlyphStyle;
}

export class RecordingSurface implements RenderSurface {
  calls: DrawCall[] = [];
  failOn = new Set<string>();

  clear(rect: Rect): void {
    if (this.failOn.has('clear')) throw new Error('clear refused');
    this.calls.push({ op: 'clear', rect });
  }

  postText(text: string, bounds: Rect, style: GlyphStyle): void {
    if (this.failOn.has(text)) throw new Error('glyph cache full');
    this.calls.push({ op: 'text', text, rect: bounds, style });
  }

  present(): void {
    this.calls.push({ op: 'present' });
  }

  texts(): string[] {
    return this.calls.filter(c => c.op === 'text').map(c => c.text ?? '');
  }
}
