import { layout, DEFAULT_METRICS } from './layout.js';
import type { ReadonlyMessageLog } from '../log/message-log.js';
import type { DiagnosticLogSink, LayoutMetrics, RenderSurface, Viewport } from '../types.js';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Repaints the whole viewport from the log. Surface calls are
 * fire-and-forget: a failing call is logged and the repaint carries on.
 * Returns the number of text lines posted.
 */
export function redraw(
  surface: RenderSurface,
  viewport: Viewport,
  log: ReadonlyMessageLog,
  sink: DiagnosticLogSink,
  metrics: LayoutMetrics = DEFAULT_METRICS
): number {
  try {
    surface.clear({ left: 0, top: 0, right: viewport.width, bottom: viewport.height });
  } catch (err) {
    sink.warn(`clear failed: ${errorMessage(err)}`);
  }

  let posted = 0;
  for (const line of layout(viewport, log, metrics)) {
    try {
      surface.postText(line.text, line.box, 'small');
      posted++;
    } catch (err) {
      sink.warn(`postText failed at y=${line.box.bottom}: ${errorMessage(err)}`);
    }
  }

  try {
    surface.present();
  } catch (err) {
    sink.warn(`present failed: ${errorMessage(err)}`);
  }
  return posted;
}
