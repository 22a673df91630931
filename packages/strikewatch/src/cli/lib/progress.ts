/**
 * Ingest progress on stderr, one line per finished slot
 */

import type { IngestObserver, UnitOutcome } from '../../acquisition/ingest-pipeline.js';

export type ProgressWriter = (line: string) => void;

const stderrWriter: ProgressWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export class ProgressReporter implements IngestObserver {
  private readonly write: ProgressWriter;

  constructor(write: ProgressWriter = stderrWriter) {
    this.write = write;
  }

  onUnitComplete(outcome: UnitOutcome, progress: { done: number; total: number }): void {
    const pct = progress.total === 0 ? 100 : Math.floor((progress.done / progress.total) * 100);
    const detail =
      outcome.status === 'succeeded'
        ? `+${outcome.inserted} strikes`
        : outcome.error ?? outcome.status;
    this.write(
      `[${progress.done}/${progress.total} ${pct}%] ${outcome.slot} ${outcome.status}: ${detail}`
    );
  }
}
