import * as fs from 'fs';
import * as path from 'path';
import { classifyLines, splitLines } from './classifier';
import { NMON_LAYOUTS, PERCENTILE } from './layouts';
import { lparReducerFor, reduceMemory, reduceRunQueue } from './reducers';
import { column, quantile } from './statistics';
import type { FileOutcome, PipelineLogger, ReducerOutcome } from './types';

// nmon writes locale-specific bytes into some headers; latin1 maps every
// byte to a code point so the read never fails on them.
export const NMON_ENCODING: BufferEncoding = 'latin1';

/**
 * Runs classification and every reducer over the text of one log.
 * Throws on anything the reducers do not absorb; processNmonFile is the
 * boundary that turns that into a failed outcome.
 */
export function summarizeNmonText(nmonfile: string, text: string, logger: PipelineLogger): FileOutcome {
  const log = classifyLines(splitLines(text), logger);

  if (log.lpar.length === 0) {
    const reason = `No LPAR data found in ${nmonfile}`;
    logger.warn(reason, { nmonfile });
    return { status: 'skipped', reason };
  }

  const layout = NMON_LAYOUTS[log.osFlavor];
  const degraded: string[] = [];
  const settle = <T>(name: string, outcome: ReducerOutcome<T>): T => {
    if (outcome.status === 'degraded') {
      degraded.push(name);
      logger.error(`Error calculating ${name} metrics: ${outcome.reason}`, {
        nmonfile,
        os_flavor: log.osFlavor,
      });
    }
    return outcome.value;
  };

  const lpar = settle(`${log.osFlavor} LPAR`, lparReducerFor(log.osFlavor)(log.lpar));
  const cpuP95 = quantile(column(log.lpar, layout.cpuPercentile), PERCENTILE);
  const runQueueP95 = settle('run queue', reduceRunQueue(log.proc));
  const memory = settle('memory', reduceMemory(log.mem, layout.memory));

  return {
    status: 'summarized',
    result: {
      nmonfile,
      os_flavor: log.osFlavor,
      system_info: log.systemInfo,
      lpar,
      cpu_p95: cpuP95,
      run_queue_p95: runQueueP95,
      memory,
      stats: log.stats,
      degraded,
    },
  };
}

export async function processNmonFile(filePath: string, logger: PipelineLogger): Promise<FileOutcome> {
  try {
    const text = await fs.promises.readFile(filePath, NMON_ENCODING);
    return summarizeNmonText(path.basename(filePath), text, logger);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Error processing ${filePath}: ${err.message}`, {
      file: filePath,
      stack: err.stack,
    });
    return { status: 'failed', error: err };
  }
}
