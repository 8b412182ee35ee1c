import type { PoolConfig } from 'pg';
import { createTargetPool, targetDbConfig } from '../config/database';
import type { SummarySettings } from '../config/settings';
import { CsvReportSink } from './csv-sink';
import { PostgresReportSink } from './postgres-sink';
import type { ReportSink } from './types';

export function createSinks(
  settings: Pick<SummarySettings, 'sink' | 'outputFile'>,
  runId: string,
  dbConfig: PoolConfig = targetDbConfig()
): ReportSink[] {
  const sinks: ReportSink[] = [];
  if (settings.sink === 'csv' || settings.sink === 'both') {
    sinks.push(new CsvReportSink(settings.outputFile));
  }
  if (settings.sink === 'postgres' || settings.sink === 'both') {
    sinks.push(new PostgresReportSink({ pool: createTargetPool(dbConfig), runId }));
  }
  return sinks;
}
