import type { ReadonlyMessageLog } from '../log/message-log.js';
import type { LayoutLine, LayoutMetrics, Viewport } from '../types.js';

export const DEFAULT_METRICS: LayoutMetrics = {
  margin: 4,
  lineHeight: 16,
};

/**
 * Stacks log entries upward from the bottom edge of the viewport, newest
 * entry lowest. Entries that would cross the top edge are dropped.
 * Returned lines are ordered newest first.
 */
export function layout(
  viewport: Viewport,
  log: ReadonlyMessageLog,
  metrics: LayoutMetrics = DEFAULT_METRICS
): LayoutLine[] {
  const { margin, lineHeight } = metrics;
  const right = Math.max(margin, viewport.width - margin);
  const lines: LayoutLine[] = [];
  let y = viewport.height - margin;

  for (const entry of log.newestFirst()) {
    if (y - lineHeight < 0) break;
    lines.push({
      text: entry.text,
      box: { left: margin, top: y - lineHeight, right, bottom: y },
    });
    y -= lineHeight;
  }
  return lines;
}
