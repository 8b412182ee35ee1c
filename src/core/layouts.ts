import type { OsFlavor } from './types';

export type Aggregate = 'min' | 'sum';

export interface ColumnRule {
  index: number;
  aggregate: Aggregate;
  // each sample is divided by this before aggregation
  divisor?: number;
}

export interface LparLayout {
  cpu: number;
  virtual_processors: ColumnRule;
  entitled_cpu: ColumnRule;
  pool_cpu: ColumnRule;
  pool_idle: ColumnRule;
  weight: ColumnRule;
  capped: ColumnRule;
}

export interface MemoryLayout {
  total: number;
  free: number;
}

export interface NmonLayout {
  lpar: LparLayout;
  // CPU column used for the 95th percentile, read apart from the LPAR reducer
  cpuPercentile: number;
  memory: MemoryLayout;
}

// Column offsets are 0-indexed positions in the comma-split record,
// tag and timestamp included (LPAR,T0001,...).
export const NMON_LAYOUTS: Record<OsFlavor, NmonLayout> = {
  AIX: {
    lpar: {
      cpu: 2,
      virtual_processors: { index: 3, aggregate: 'min' },
      entitled_cpu: { index: 6, aggregate: 'min' },
      pool_cpu: { index: 5, aggregate: 'min' },
      pool_idle: { index: 8, aggregate: 'min' },
      weight: { index: 7, aggregate: 'min' },
      capped: { index: 12, aggregate: 'min' },
    },
    cpuPercentile: 2,
    memory: { total: 6, free: 4 },
  },
  Linux: {
    lpar: {
      cpu: 2,
      virtual_processors: { index: 13, aggregate: 'sum' },
      entitled_cpu: { index: 10, aggregate: 'sum' },
      pool_cpu: { index: 8, aggregate: 'sum', divisor: 100 },
      pool_idle: { index: 21, aggregate: 'sum' },
      weight: { index: 16, aggregate: 'sum' },
      capped: { index: 4, aggregate: 'sum' },
    },
    cpuPercentile: 10,
    memory: { total: 2, free: 7 },
  },
};

export const MIN_FIELDS = {
  LPAR: 14,
  PROC: 3,
  MEM: 8,
} as const;

export const RECORD_PREFIXES = {
  AIX: 'AAA,AIX',
  LPAR: 'LPAR,T',
  PROC: 'PROC,T',
  MEM: 'MEM,T',
} as const;

export const RUN_QUEUE_COLUMN = 2;
export const PERCENTILE = 0.95;
export const KIB_PER_GIB = 1024;
