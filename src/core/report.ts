import { readSystemInfo } from './header';
import type { FileResult } from './types';

export const REPORT_COLUMNS = [
  { id: 'nmonfile', title: 'nmonfile' },
  { id: 'report_date', title: 'Date' },
  { id: 'lpar_name', title: 'LPAR Name' },
  { id: 'system_model', title: 'System Model' },
  { id: 'machine_serial', title: 'Machine Serial Number' },
  { id: 'processor_type', title: 'Processor Type' },
  { id: 'snapshots', title: 'Snapshots' },
  { id: 'vp', title: 'VP' },
  { id: 'entitled_cpu', title: 'Entitled CPU' },
  { id: 'vp_e', title: 'VP:E' },
  { id: 'pool_cpu', title: 'Pool CPU' },
  { id: 'pool_idle', title: 'Pool Idle' },
  { id: 'weight', title: 'Weight' },
  { id: 'capped', title: 'Capped' },
  { id: 'total_cpu', title: 'Total CPU' },
  { id: 'min_cpu', title: 'Min CPU' },
  { id: 'avg_cpu', title: 'Avg CPU' },
  { id: 'max_cpu', title: 'Max CPU' },
  { id: 'cpu_p95', title: '95 Percentile CPU' },
  { id: 'run_queue_p95', title: 'Run Queue 95' },
  { id: 'mem_count', title: 'Count Mem' },
  { id: 'mem_min_gb', title: 'Min MEM Used' },
  { id: 'mem_avg_gb', title: 'Avg MEM Used' },
  { id: 'mem_max_gb', title: 'Max MEM Used' },
  { id: 'mem_p95_gb', title: '95 percentile GB' },
] as const;

export type ReportColumnId = (typeof REPORT_COLUMNS)[number]['id'];

export type ReportRow = Record<ReportColumnId, string | number | null>;

export function toReportRow(result: FileResult): ReportRow {
  const info = result.system_info;
  const { lpar, memory } = result;

  return {
    nmonfile: result.nmonfile,
    report_date: readSystemInfo(info, 'Date'),
    lpar_name: readSystemInfo(info, 'LPAR Name'),
    system_model: readSystemInfo(info, 'System Model'),
    machine_serial: readSystemInfo(info, 'Machine Serial Number'),
    processor_type: readSystemInfo(info, 'Processor Type'),
    snapshots: lpar.snapshots,
    vp: lpar.virtual_processors,
    entitled_cpu: lpar.entitled_cpu,
    vp_e: lpar.vp_entitlement_ratio,
    pool_cpu: lpar.pool_cpu,
    pool_idle: lpar.pool_idle,
    weight: lpar.weight,
    capped: lpar.capped,
    total_cpu: lpar.total_cpu,
    min_cpu: lpar.min_cpu,
    avg_cpu: lpar.avg_cpu,
    max_cpu: lpar.max_cpu,
    cpu_p95: result.cpu_p95,
    run_queue_p95: result.run_queue_p95,
    mem_count: memory.count,
    mem_min_gb: memory.min_used_gb,
    mem_avg_gb: memory.avg_used_gb,
    mem_max_gb: memory.max_used_gb,
    mem_p95_gb: memory.p95_used_gb,
  };
}

/** Row values in column order, for sinks that bind positionally. */
export function toReportValues(row: ReportRow): Array<string | number | null> {
  return REPORT_COLUMNS.map(column => row[column.id]);
}
