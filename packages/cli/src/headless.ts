import { isBugVerdict } from '@ecdh-probe/core';
import type { DiagnosticSession } from '@ecdh-probe/core';

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_BUG_FOUND = 2;

/** Runs the diagnostic once and writes the transcript, oldest line first. */
export function runOnce(session: DiagnosticSession, write: (line: string) => void): number {
  const result = session.dispatch('run');
  for (const text of session.log.texts()) write(text);

  if (!result.report) return EXIT_ABORTED;
  return isBugVerdict(result.report.verdict) ? EXIT_BUG_FOUND : EXIT_OK;
}
