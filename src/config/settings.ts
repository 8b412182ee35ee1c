import * as dotenv from 'dotenv';

dotenv.config();

export type SinkKind = 'csv' | 'postgres' | 'both';

export interface SummarySettings {
  inputDir: string;
  outputFile: string;
  sink: SinkKind;
  concurrency: number;
  logLevel: string;
  logDir: string;
}

const SINKS: readonly SinkKind[] = ['csv', 'postgres', 'both'];

const isSinkKind = (value: string): value is SinkKind => SINKS.some(sink => sink === value);

function flag(argv: string[], name: string): string | undefined {
  const arg = argv.find(a => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

export function parseSink(value: string): SinkKind {
  const normalized = value.trim().toLowerCase();
  if (!isSinkKind(normalized)) {
    throw new Error(`Unknown sink '${value}', expected one of ${SINKS.join(', ')}`);
  }
  return normalized;
}

export function parseConcurrency(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`Concurrency must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Settings come from the environment (and .env), command-line flags of the
 * form --name=value win over it.
 */
export function loadSettings(argv: string[] = [], env: NodeJS.ProcessEnv = process.env): SummarySettings {
  return {
    inputDir: flag(argv, 'input') || env.NMON_INPUT_DIR || './NMON_Reports/',
    outputFile: flag(argv, 'output') || env.NMON_OUTPUT_FILE || 'nmon_summary.csv',
    sink: parseSink(flag(argv, 'sink') || env.NMON_SINK || 'csv'),
    concurrency: parseConcurrency(flag(argv, 'concurrency') || env.NMON_CONCURRENCY || '4'),
    logLevel: env.LOG_LEVEL || 'info',
    logDir: env.LOG_DIR || 'summary_logs',
  };
}
