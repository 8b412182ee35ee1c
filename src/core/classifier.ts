import { extractHeader } from './header';
import { MIN_FIELDS, RECORD_PREFIXES } from './layouts';
import type { ClassifiedLog, KindStats, PipelineLogger, RawRecord, RecordKind } from './types';

type MetricKind = 'LPAR' | 'PROC' | 'MEM';

const emptyStats = (): KindStats => ({ seen: 0, retained: 0, discarded: 0 });

// The AIX tag line carries no data of its own: it is 'ignored' as a record
// and only flips the OS flavor.
export function recordKind(line: string): RecordKind {
  if (line.startsWith(RECORD_PREFIXES.AIX)) return 'ignored';
  if (line.startsWith(RECORD_PREFIXES.LPAR)) return 'LPAR';
  if (line.startsWith(RECORD_PREFIXES.PROC)) return 'PROC';
  if (line.startsWith(RECORD_PREFIXES.MEM)) return 'MEM';
  return 'header';
}

/**
 * Single linear scan over a log. Metric lines go to their collection when
 * they carry enough fields, everything else feeds the header extractor.
 * The OS flavor is part of the result so reducers see the value for the
 * whole file, including lines read before the AIX tag.
 */
export function classifyLines(lines: Iterable<string>, logger: PipelineLogger): ClassifiedLog {
  const log: ClassifiedLog = {
    osFlavor: 'Linux',
    lpar: [],
    proc: [],
    mem: [],
    systemInfo: {},
    stats: { LPAR: emptyStats(), PROC: emptyStats(), MEM: emptyStats() },
  };

  const collections: Record<MetricKind, RawRecord[]> = {
    LPAR: log.lpar,
    PROC: log.proc,
    MEM: log.mem,
  };

  for (const line of lines) {
    const kind = recordKind(line);
    if (kind === 'ignored') {
      log.osFlavor = 'AIX';
      continue;
    }
    if (kind === 'header') {
      extractHeader(line, log.systemInfo);
      continue;
    }

    const fields = line.trim().split(',');
    const stats = log.stats[kind];
    stats.seen++;

    if (fields.length >= MIN_FIELDS[kind]) {
      collections[kind].push(fields);
      stats.retained++;
      continue;
    }

    stats.discarded++;
    // short MEM lines are dropped without a warning
    if (kind !== 'MEM') {
      logger.warn(`${kind} line has unexpected format: ${line.trim()}`, {
        kind,
        fields: fields.length,
        required: MIN_FIELDS[kind],
      });
    }
  }

  return log;
}

// CRLF, LF and lone CR endings all end a line.
export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}
