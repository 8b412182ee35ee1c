export type OsFlavor = 'AIX' | 'Linux';

export type RecordKind = 'LPAR' | 'PROC' | 'MEM' | 'header' | 'ignored';

export type RawRecord = string[];

export type SystemInfoField =
  | 'Date'
  | 'LPAR Name'
  | 'System Model'
  | 'Machine Serial Number'
  | 'Processor Type';

export type SystemInfo = Partial<Record<SystemInfoField, string>>;

export interface KindStats {
  seen: number;
  retained: number;
  discarded: number;
}

export interface ClassifiedLog {
  osFlavor: OsFlavor;
  lpar: RawRecord[];
  proc: RawRecord[];
  mem: RawRecord[];
  systemInfo: SystemInfo;
  stats: Record<'LPAR' | 'PROC' | 'MEM', KindStats>;
}

export interface LparMetrics {
  snapshots: number;
  virtual_processors: number;
  entitled_cpu: number;
  vp_entitlement_ratio: number;
  pool_cpu: number;
  pool_idle: number;
  weight: number;
  capped: number;
  total_cpu: number;
  min_cpu: number;
  avg_cpu: number;
  max_cpu: number;
}

export interface MemoryMetrics {
  count: number;
  min_used_gb: number;
  avg_used_gb: number;
  max_used_gb: number;
  p95_used_gb: number;
}

export type ReducerOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string };

export interface FileResult {
  nmonfile: string;
  os_flavor: OsFlavor;
  system_info: SystemInfo;
  lpar: LparMetrics;
  cpu_p95: number;
  run_queue_p95: number | null;
  memory: MemoryMetrics;
  stats: ClassifiedLog['stats'];
  degraded: string[];
}

export type FileOutcome =
  | { status: 'summarized'; result: FileResult }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: Error };

/**
 * Minimal logging surface the parsing core writes to. SummaryLogger
 * implements it; tests pass recording fakes.
 */
export interface PipelineLogger {
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
}

export interface RunMetrics {
  run_id: string;
  start_time: Date;
  end_time: Date;
  total_duration_ms: number;

  files_seen: number;
  files_summarized: number;
  files_skipped: number;
  files_failed: number;
  files_degraded: number;
  records_discarded: number;

  discover_duration_ms: number;
  summarize_duration_ms: number;
  write_duration_ms: number;

  memory_start_mb: number;
  memory_peak_mb: number;
  memory_end_mb: number;

  cpu_user_ms: number;
  cpu_system_ms: number;

  detailed_timings: PhaseTiming[];
}

export interface PhaseTiming {
  phase: string;
  duration_ms: number;
  records?: number;
  timestamp: Date;
}
