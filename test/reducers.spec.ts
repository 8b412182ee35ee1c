import { describe, expect, it } from 'vitest';
import { NMON_LAYOUTS } from '../src/core/layouts';
import {
  lparReducerFor,
  reduceAixLpar,
  reduceLinuxLpar,
  reduceMemory,
  reduceRunQueue,
  vpEntitlementRatio,
} from '../src/core/reducers';
import type { RawRecord } from '../src/core/types';
import { AIX_SAMPLES, LINUX_SAMPLES, aixLpar, linuxLpar, record } from './helpers/nmon-builders';

const split = (lines: string[]): RawRecord[] => lines.map(line => line.split(','));

const aixRecords = split(AIX_SAMPLES.map((s, i) => aixLpar(`T000${i + 1}`, s)));
const linuxRecords = split(LINUX_SAMPLES.map((s, i) => linuxLpar(`T000${i + 1}`, s)));

describe('reduceAixLpar', () => {
  it('takes minimums of the capacity columns', () => {
    const outcome = reduceAixLpar(aixRecords);

    expect(outcome.status).toBe('ok');
    expect(outcome.value).toEqual({
      snapshots: 3,
      virtual_processors: 4,
      entitled_cpu: 2,
      vp_entitlement_ratio: 200,
      pool_cpu: 14,
      pool_idle: 8,
      weight: 64,
      capped: 0,
      total_cpu: 4.5,
      min_cpu: 0.5,
      avg_cpu: 1.5,
      max_cpu: 2.5,
    });
  });

  it('reports a zero ratio when entitlement is zero', () => {
    const records = split([aixLpar('T0001', { ...AIX_SAMPLES[0], entitled: 0 })]);
    const outcome = reduceAixLpar(records);

    expect(outcome.status).toBe('ok');
    expect(outcome.value.vp_entitlement_ratio).toBe(0);
  });

  it('degrades to twelve zeros on a non-numeric field', () => {
    const records = split([aixLpar('T0001', AIX_SAMPLES[0]).replace('LPAR,T0001,1.5', 'LPAR,T0001,abc')]);
    const outcome = reduceAixLpar(records);

    expect(outcome.status).toBe('degraded');
    expect(Object.values(outcome.value)).toEqual(new Array(12).fill(0));
    if (outcome.status === 'degraded') {
      expect(outcome.reason).toBe("could not convert 'abc' in column 2 to float");
    }
  });

  it('degrades to twelve zeros on an empty collection', () => {
    const outcome = reduceAixLpar([]);

    expect(outcome).toEqual({
      status: 'degraded',
      value: expect.objectContaining({ snapshots: 0, max_cpu: 0 }),
      reason: 'no LPAR samples',
    });
    expect(Object.keys(outcome.value)).toHaveLength(12);
  });
});

describe('reduceLinuxLpar', () => {
  it('sums the capacity columns and scales pool CPU', () => {
    const outcome = reduceLinuxLpar(linuxRecords);

    expect(outcome.status).toBe('ok');
    expect(outcome.value).toEqual({
      snapshots: 2,
      virtual_processors: 4,
      entitled_cpu: 2,
      vp_entitlement_ratio: 200,
      pool_cpu: 6,
      pool_idle: 4,
      weight: 200,
      capped: 1,
      total_cpu: 40,
      min_cpu: 10,
      avg_cpu: 20,
      max_cpu: 30,
    });
  });

  it('degrades when a layout column is past the end of the record', () => {
    const outcome = reduceLinuxLpar(aixRecords);

    expect(outcome.status).toBe('degraded');
    expect(Object.values(outcome.value)).toEqual(new Array(12).fill(0));
    if (outcome.status === 'degraded') {
      expect(outcome.reason).toBe('column 21 missing in LPAR,T0001');
    }
  });

  it('reports a zero ratio when entitlement sums to zero', () => {
    const records = split(LINUX_SAMPLES.map((s, i) => linuxLpar(`T000${i + 1}`, { ...s, entitled: 0 })));
    expect(reduceLinuxLpar(records).value.vp_entitlement_ratio).toBe(0);
  });
});

describe('vpEntitlementRatio', () => {
  it('never divides by a non-positive entitlement', () => {
    expect(vpEntitlementRatio(4, 0)).toBe(0);
    expect(vpEntitlementRatio(4, -1)).toBe(0);
    expect(vpEntitlementRatio(3, 2)).toBe(150);
  });
});

describe('lparReducerFor', () => {
  it('selects the reducer by OS flavor', () => {
    expect(lparReducerFor('AIX')).toBe(reduceAixLpar);
    expect(lparReducerFor('Linux')).toBe(reduceLinuxLpar);
  });
});

describe('reduceRunQueue', () => {
  it('returns the interpolated 95th percentile of column 2', () => {
    const records = split(['1', '2', '3', '4', '5'].map((rq, i) => `PROC,T000${i + 1},${rq},0`));
    const outcome = reduceRunQueue(records);

    expect(outcome.status).toBe('ok');
    expect(outcome.value).toBeCloseTo(4.8, 10);
  });

  it('reports null rather than zero without samples', () => {
    expect(reduceRunQueue([])).toEqual({ status: 'ok', value: null });
  });

  it('keeps a measured zero', () => {
    expect(reduceRunQueue(split(['PROC,T0001,0,0'])).value).toBe(0);
  });

  it('degrades to null on a bad value', () => {
    const outcome = reduceRunQueue(split(['PROC,T0001,busy,0']));
    expect(outcome.status).toBe('degraded');
    expect(outcome.value).toBeNull();
  });
});

describe('reduceMemory', () => {
  it('uses real total minus real free on AIX, in gigabytes', () => {
    const records = split([
      record('MEM', 'T0001', 8, { 4: 2048, 6: 4096 }),
      record('MEM', 'T0002', 8, { 4: 1024, 6: 4096 }),
    ]);
    const outcome = reduceMemory(records, NMON_LAYOUTS.AIX.memory);

    expect(outcome.status).toBe('ok');
    expect(outcome.value.count).toBe(2);
    expect(outcome.value.min_used_gb).toBe(2);
    expect(outcome.value.avg_used_gb).toBe(2.5);
    expect(outcome.value.max_used_gb).toBe(3);
    expect(outcome.value.p95_used_gb).toBeCloseTo(2.95, 10);
  });

  it('uses columns 2 and 7 on Linux', () => {
    const records = split([record('MEM', 'T0001', 8, { 2: 8192, 7: 6144 })]);
    const outcome = reduceMemory(records, NMON_LAYOUTS.Linux.memory);

    expect(outcome.value).toEqual({
      count: 1,
      min_used_gb: 2,
      avg_used_gb: 2,
      max_used_gb: 2,
      p95_used_gb: 2,
    });
  });

  it('degrades to five zeros without samples', () => {
    expect(reduceMemory([], NMON_LAYOUTS.Linux.memory)).toEqual({
      status: 'degraded',
      value: { count: 0, min_used_gb: 0, avg_used_gb: 0, max_used_gb: 0, p95_used_gb: 0 },
      reason: 'no MEM samples',
    });
  });

  it('degrades to five zeros on a bad value, count included', () => {
    const records = split([record('MEM', 'T0001', 8, { 2: 'n/a' })]);
    const outcome = reduceMemory(records, NMON_LAYOUTS.Linux.memory);

    expect(outcome.status).toBe('degraded');
    expect(outcome.value.count).toBe(0);
  });
});
