import { type ColumnRule, KIB_PER_GIB, type LparLayout, type MemoryLayout, NMON_LAYOUTS, PERCENTILE, RUN_QUEUE_COLUMN } from './layouts';
import { ConversionError, column, max, mean, min, quantile, sum } from './statistics';
import type { LparMetrics, MemoryMetrics, OsFlavor, RawRecord, ReducerOutcome } from './types';

export const ZERO_LPAR_METRICS: Readonly<LparMetrics> = Object.freeze({
  snapshots: 0,
  virtual_processors: 0,
  entitled_cpu: 0,
  vp_entitlement_ratio: 0,
  pool_cpu: 0,
  pool_idle: 0,
  weight: 0,
  capped: 0,
  total_cpu: 0,
  min_cpu: 0,
  avg_cpu: 0,
  max_cpu: 0,
});

export const ZERO_MEMORY_METRICS: Readonly<MemoryMetrics> = Object.freeze({
  count: 0,
  min_used_gb: 0,
  avg_used_gb: 0,
  max_used_gb: 0,
  p95_used_gb: 0,
});

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

function aggregate(records: RawRecord[], rule: ColumnRule): number {
  const divisor = rule.divisor ?? 1;
  const values = column(records, rule.index).map(v => v / divisor);
  return rule.aggregate === 'min' ? min(values) : sum(values);
}

export function vpEntitlementRatio(vp: number, entitled: number): number {
  return entitled > 0 ? (vp / entitled) * 100 : 0;
}

/**
 * Reduces LPAR samples with the given column layout. Failures never escape:
 * the caller gets twelve zeros marked as degraded.
 */
export function reduceLpar(records: RawRecord[], layout: LparLayout): ReducerOutcome<LparMetrics> {
  try {
    if (records.length === 0) {
      throw new ConversionError('no LPAR samples');
    }

    const cpu = column(records, layout.cpu);
    const total = sum(cpu);
    const vp = aggregate(records, layout.virtual_processors);
    const entitled = aggregate(records, layout.entitled_cpu);

    return {
      status: 'ok',
      value: {
        snapshots: records.length,
        virtual_processors: vp,
        entitled_cpu: entitled,
        vp_entitlement_ratio: vpEntitlementRatio(vp, entitled),
        pool_cpu: aggregate(records, layout.pool_cpu),
        pool_idle: aggregate(records, layout.pool_idle),
        weight: aggregate(records, layout.weight),
        capped: aggregate(records, layout.capped),
        total_cpu: total,
        min_cpu: min(cpu),
        avg_cpu: total / records.length,
        max_cpu: max(cpu),
      },
    };
  } catch (error) {
    return { status: 'degraded', value: { ...ZERO_LPAR_METRICS }, reason: reasonOf(error) };
  }
}

export const reduceAixLpar = (records: RawRecord[]): ReducerOutcome<LparMetrics> =>
  reduceLpar(records, NMON_LAYOUTS.AIX.lpar);

export const reduceLinuxLpar = (records: RawRecord[]): ReducerOutcome<LparMetrics> =>
  reduceLpar(records, NMON_LAYOUTS.Linux.lpar);

export function lparReducerFor(osFlavor: OsFlavor): (records: RawRecord[]) => ReducerOutcome<LparMetrics> {
  return osFlavor === 'AIX' ? reduceAixLpar : reduceLinuxLpar;
}

/**
 * 95th percentile of the run queue column. No PROC samples is reported as
 * null, which stays distinct from a measured zero.
 */
export function reduceRunQueue(records: RawRecord[]): ReducerOutcome<number | null> {
  if (records.length === 0) {
    return { status: 'ok', value: null };
  }

  try {
    return { status: 'ok', value: quantile(column(records, RUN_QUEUE_COLUMN), PERCENTILE) };
  } catch (error) {
    return { status: 'degraded', value: null, reason: reasonOf(error) };
  }
}

export function reduceMemory(records: RawRecord[], layout: MemoryLayout): ReducerOutcome<MemoryMetrics> {
  try {
    if (records.length === 0) {
      throw new ConversionError('no MEM samples');
    }

    const total = column(records, layout.total);
    const free = column(records, layout.free);
    const used = total.map((t, i) => t - free[i]);

    return {
      status: 'ok',
      value: {
        count: records.length,
        min_used_gb: min(used) / KIB_PER_GIB,
        avg_used_gb: mean(used) / KIB_PER_GIB,
        max_used_gb: max(used) / KIB_PER_GIB,
        p95_used_gb: quantile(used, PERCENTILE) / KIB_PER_GIB,
      },
    };
  } catch (error) {
    return { status: 'degraded', value: { ...ZERO_MEMORY_METRICS }, reason: reasonOf(error) };
  }
}
