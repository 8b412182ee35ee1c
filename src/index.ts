#!/usr/bin/env node
import * as crypto from 'crypto';
import { summarizeFiles } from './batch/aggregator';
import { listNmonFiles } from './batch/discovery';
import { loadSettings } from './config/settings';
import { SummaryLogger } from './core/logger';
import { createSinks } from './sinks';

function generateRunId(): string {
  return `run_${Date.now()}_${crypto.randomBytes(4).toString('hex')}`;
}

async function main(): Promise<number> {
  const settings = loadSettings(process.argv.slice(2));
  const runId = generateRunId();
  const logger = new SummaryLogger({ runId, level: settings.logLevel, logDir: settings.logDir });

  console.log('\n===========================================');
  console.log('nmon capacity summary');
  console.log('===========================================');
  console.log(`Input:  ${settings.inputDir}`);
  console.log(`Output: ${settings.sink === 'postgres' ? 'postgres' : settings.outputFile}`);
  console.log('===========================================\n');

  const sinks = createSinks(settings, runId);

  try {
    logger.logPhaseStart('discover');
    const files = await listNmonFiles(settings.inputDir);
    logger.logPhaseEnd('discover', files.length);

    logger.logPhaseStart('summarize');
    const batch = await summarizeFiles(files, { concurrency: settings.concurrency, logger });
    logger.logPhaseEnd('summarize', batch.rows.length);

    logger.logPhaseStart('write');
    for (const sink of sinks) {
      await sink.write(batch.rows);
      logger.info(`Report written to ${sink.name}`, { rows: batch.rows.length });
    }
    logger.logPhaseEnd('write', batch.rows.length);

    const metrics = logger.finalizeMetrics(batch.counts);
    console.table([{
      'Files': metrics.files_seen,
      'Summarized': metrics.files_summarized,
      'Skipped': metrics.files_skipped,
      'Failed': metrics.files_failed,
      'Degraded': metrics.files_degraded,
      'Discarded Records': metrics.records_discarded,
      'Total Time (s)': (metrics.total_duration_ms / 1000).toFixed(2)
    }]);
    return 0;
  } catch (error) {
    logger.logError(error instanceof Error ? error : new Error(String(error)), { input: settings.inputDir });
    return 1;
  } finally {
    for (const sink of sinks) {
      await sink.close();
    }
    logger.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Error in main execution:', error);
    process.exitCode = 1;
  });
