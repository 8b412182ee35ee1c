import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import type { FileOutcome, PhaseTiming, PipelineLogger, RunMetrics } from './types';

export interface SummaryLoggerOptions {
  runId: string;
  level?: string;
  // null keeps everything on the console and writes no metrics file
  logDir?: string | null;
  console?: boolean;
}

export type RunCounts = Pick<
  RunMetrics,
  | 'files_seen'
  | 'files_summarized'
  | 'files_skipped'
  | 'files_failed'
  | 'files_degraded'
  | 'records_discarded'
>;

const PHASE_FIELDS = {
  discover: 'discover_duration_ms',
  summarize: 'summarize_duration_ms',
  write: 'write_duration_ms',
} as const;

const isKnownPhase = (phase: string): phase is keyof typeof PHASE_FIELDS => phase in PHASE_FIELDS;

export class SummaryLogger implements PipelineLogger {
  private logger: winston.Logger;
  private metricsFile: string | null;
  private startTime: number;
  private memoryBaseline: NodeJS.MemoryUsage;
  private cpuBaseline: NodeJS.CpuUsage;
  private peakMemory: number = 0;
  private memoryMonitor: NodeJS.Timeout;
  private phaseStarts = new Map<string, number>();
  private timings: PhaseTiming[] = [];
  private runId: string;
  private startDate: Date;

  constructor(options: SummaryLoggerOptions) {
    this.runId = options.runId;
    const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
      new winston.transports.Console({
        silent: options.console === false,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ];

    this.metricsFile = null;
    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      const timestamp = new Date().toISOString().replace(/:/g, '-');
      transports.push(new winston.transports.File({
        filename: path.join(options.logDir, `nmon_summary_${timestamp}.log`)
      }));
      this.metricsFile = path.join(options.logDir, `metrics_${timestamp}.json`);
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      defaultMeta: { run_id: this.runId },
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      transports
    });

    this.startTime = Date.now();
    this.startDate = new Date();
    this.memoryBaseline = process.memoryUsage();
    this.cpuBaseline = process.cpuUsage();
    this.peakMemory = this.memoryBaseline.heapUsed / 1024 / 1024;

    this.memoryMonitor = setInterval(() => {
      const currentMemory = process.memoryUsage().heapUsed / 1024 / 1024;
      if (currentMemory > this.peakMemory) {
        this.peakMemory = currentMemory;
      }
    }, 100);
    this.memoryMonitor.unref();
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  public error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  public logPhaseStart(phase: string): void {
    this.phaseStarts.set(phase, Date.now());
    this.logger.info(`Phase started: ${phase}`, {
      phase,
      timestamp: Date.now() - this.startTime,
      memory_mb: process.memoryUsage().heapUsed / 1024 / 1024
    });
  }

  public logPhaseEnd(phase: string, recordCount?: number): void {
    const duration = Date.now() - (this.phaseStarts.get(phase) ?? this.startTime);
    this.logger.info(`Phase completed: ${phase}`, {
      phase,
      duration_ms: duration,
      records: recordCount,
      memory_mb: process.memoryUsage().heapUsed / 1024 / 1024
    });

    this.timings.push({
      phase,
      duration_ms: duration,
      records: recordCount,
      timestamp: new Date()
    });
  }

  public logFileOutcome(filePath: string, outcome: FileOutcome): void {
    switch (outcome.status) {
      case 'summarized':
        this.info(`Summarized ${outcome.result.nmonfile}`, {
          file: filePath,
          os_flavor: outcome.result.os_flavor,
          snapshots: outcome.result.lpar.snapshots,
          records: outcome.result.stats,
          degraded: outcome.result.degraded
        });
        break;
      case 'skipped':
        this.info(`Skipped ${filePath}`, { file: filePath, reason: outcome.reason });
        break;
      case 'failed':
        this.logger.debug(`Failed ${filePath}`, { file: filePath, message: outcome.error.message });
        break;
    }
  }

  public logProgress(current: number, total: number, phase: string): void {
    const percentage = total > 0 ? ((current / total) * 100).toFixed(2) : '100.00';
    this.logger.info(`Progress: ${phase}`, {
      current,
      total,
      percentage: `${percentage}%`
    });
  }

  public logError(error: Error, context?: Record<string, unknown>): void {
    this.logger.error('Error occurred', {
      message: error.message,
      stack: error.stack,
      context,
      timestamp: Date.now() - this.startTime
    });
  }

  public finalizeMetrics(counts: RunCounts): RunMetrics {
    const totalDuration = Date.now() - this.startTime;
    const cpuUsage = process.cpuUsage(this.cpuBaseline);

    const finalMetrics: RunMetrics = {
      run_id: this.runId,
      start_time: this.startDate,
      end_time: new Date(),
      total_duration_ms: totalDuration,
      ...counts,
      discover_duration_ms: 0,
      summarize_duration_ms: 0,
      write_duration_ms: 0,
      memory_start_mb: this.memoryBaseline.heapUsed / 1024 / 1024,
      memory_peak_mb: this.peakMemory,
      memory_end_mb: process.memoryUsage().heapUsed / 1024 / 1024,
      cpu_user_ms: cpuUsage.user / 1000,
      cpu_system_ms: cpuUsage.system / 1000,
      detailed_timings: [...this.timings]
    };

    for (const timing of this.timings) {
      const phase = timing.phase.toLowerCase();
      if (isKnownPhase(phase)) {
        finalMetrics[PHASE_FIELDS[phase]] += timing.duration_ms;
      }
    }

    if (this.metricsFile) {
      fs.writeFileSync(this.metricsFile, JSON.stringify(finalMetrics, null, 2));
    }

    this.logger.info('Summary run completed', {
      total_duration_seconds: (totalDuration / 1000).toFixed(2),
      ...counts,
      memory_peak_mb: this.peakMemory.toFixed(2),
      cpu_seconds: ((cpuUsage.user + cpuUsage.system) / 1000000).toFixed(2)
    });

    return finalMetrics;
  }

  public close(): void {
    clearInterval(this.memoryMonitor);
    this.logger.close();
  }
}
