import { EventEmitter } from 'events';
import { DEFAULT_METRICS } from '@ecdh-probe/core';
import type { GlyphStyle, LayoutMetrics, Rect, RenderSurface, Viewport } from '@ecdh-probe/core';

/** Layout units per terminal column. */
export const CELL_WIDTH = 8;

export interface FrameRow {
  text: string;
  style: GlyphStyle;
}

interface PostedText {
  text: string;
  bounds: Rect;
  style: GlyphStyle;
}

export function terminalViewport(
  columns: number,
  rows: number,
  metrics: LayoutMetrics = DEFAULT_METRICS
): Viewport {
  return {
    width: columns * CELL_WIDTH,
    height: rows * metrics.lineHeight + metrics.margin,
  };
}

/**
 * Collects draw calls for one repaint and turns them into terminal rows
 * when the repaint is presented. Emits `frame` with the new rows.
 */
export class TerminalSurface extends EventEmitter implements RenderSurface {
  private pending: PostedText[] = [];
  private rowCount = 0;
  private frame: FrameRow[] = [];

  constructor(private metrics: LayoutMetrics = DEFAULT_METRICS) {
    super();
  }

  clear(rect: Rect): void {
    this.pending = [];
    this.rowCount = Math.max(0, Math.floor((rect.bottom - rect.top) / this.metrics.lineHeight));
  }

  postText(text: string, bounds: Rect, style: GlyphStyle): void {
    this.pending.push({ text, bounds, style });
  }

  present(): void {
    const rows: FrameRow[] = Array.from({ length: this.rowCount }, () => ({ text: '', style: 'small' as const }));
    for (const posted of this.pending) {
      const row = Math.floor(posted.bounds.top / this.metrics.lineHeight);
      if (row < 0 || row >= rows.length) continue;
      const indent = Math.floor(posted.bounds.left / CELL_WIDTH);
      const width = Math.max(0, Math.floor((posted.bounds.right - posted.bounds.left) / CELL_WIDTH));
      rows[row] = {
        text: ' '.repeat(indent) + posted.text.replace(/\n/g, ' ').slice(0, width),
        style: posted.style,
      };
    }
    this.pending = [];
    this.frame = rows;
    this.emit('frame', rows);
  }

  getFrame(): FrameRow[] {
    return this.frame;
  }
}
