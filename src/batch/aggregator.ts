import PQueue from 'p-queue';
import type { SummaryLogger, RunCounts } from '../core/logger';
import { processNmonFile } from '../core/pipeline';
import { type ReportRow, toReportRow } from '../core/report';
import type { FileOutcome, FileResult, PipelineLogger } from '../core/types';

export type BatchLogger = PipelineLogger & Pick<SummaryLogger, 'logFileOutcome' | 'logProgress'>;

export interface BatchOptions {
  concurrency: number;
  logger: BatchLogger;
  progressEvery?: number;
}

export interface FileEntry {
  file: string;
  outcome: FileOutcome;
}

export interface BatchResult {
  entries: FileEntry[];
  results: FileResult[];
  rows: ReportRow[];
  counts: RunCounts;
}

export function countOutcomes(entries: FileEntry[]): RunCounts {
  const counts: RunCounts = {
    files_seen: entries.length,
    files_summarized: 0,
    files_skipped: 0,
    files_failed: 0,
    files_degraded: 0,
    records_discarded: 0,
  };

  for (const { outcome } of entries) {
    if (outcome.status === 'summarized') {
      const { stats, degraded } = outcome.result;
      counts.files_summarized++;
      if (degraded.length > 0) counts.files_degraded++;
      counts.records_discarded += stats.LPAR.discarded + stats.PROC.discarded + stats.MEM.discarded;
    } else if (outcome.status === 'skipped') {
      counts.files_skipped++;
    } else {
      counts.files_failed++;
    }
  }
  return counts;
}

/**
 * Runs the file pipeline over every path with bounded concurrency. Each file
 * is independent, and rows come back in the order the files were given
 * whatever order they finish in.
 */
export async function summarizeFiles(files: string[], options: BatchOptions): Promise<BatchResult> {
  const { logger } = options;
  const progressEvery = options.progressEvery ?? 25;
  const queue = new PQueue({ concurrency: options.concurrency });
  let done = 0;

  const outcomes = await Promise.all(
    files.map(file =>
      queue.add(async (): Promise<FileOutcome> => {
        const outcome = await processNmonFile(file, logger);
        logger.logFileOutcome(file, outcome);

        done++;
        if (done % progressEvery === 0) {
          logger.logProgress(done, files.length, 'Summarize');
        }
        return outcome;
      })
    )
  );

  const entries: FileEntry[] = files.map((file, index) => ({ file, outcome: outcomes[index] }));
  const results: FileResult[] = [];
  for (const { outcome } of entries) {
    if (outcome.status === 'summarized') results.push(outcome.result);
  }

  return {
    entries,
    results,
    rows: results.map(toReportRow),
    counts: countOutcomes(entries),
  };
}
