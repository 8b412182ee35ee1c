import { vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Builds one comma-separated record: tag, timestamp, then `width - 2` data
 * fields, '0' unless given in `values` (keyed by absolute column index).
 */
export function record(tag: string, ts: string, width: number, values: Record<number, number | string>): string {
  const fields: string[] = [tag, ts];
  for (let i = 2; i < width; i++) {
    const value = values[i];
    fields.push(value === undefined ? '0' : String(value));
  }
  return fields.join(',');
}

export interface AixSample {
  cpu: number;
  vp: number;
  pool: number;
  entitled: number;
  weight: number;
  poolIdle: number;
  capped: number;
}

export const aixLpar = (ts: string, s: AixSample): string =>
  record('LPAR', ts, 14, { 2: s.cpu, 3: s.vp, 5: s.pool, 6: s.entitled, 7: s.weight, 8: s.poolIdle, 12: s.capped });

export interface LinuxSample {
  cpu: number;
  capped: number;
  pool: number;
  entitled: number;
  vp: number;
  weight: number;
  poolIdle: number;
}

export const linuxLpar = (ts: string, s: LinuxSample): string =>
  record('LPAR', ts, 22, { 2: s.cpu, 4: s.capped, 8: s.pool, 10: s.entitled, 13: s.vp, 16: s.weight, 21: s.poolIdle });

export const AIX_HEADER = [
  'AAA,progname,topas_nmon',
  'AAA,AIX,7.2.5.0',
  'AAA,date,19-OCT-2026',
  'BBBL,04,lparname,web01',
  'BBBP,001,lsconf,"System Model: IBM,9009-42A"',
  'BBBP,002,lsconf,"Machine Serial Number: 78ABC12"',
  'BBBP,003,lsconf,"Processor Type: PowerPC_POWER9"',
  'LPAR,Logical Partition web01,PhysicalCPU,virtualCPUs,logicalCPUs,poolCPUs,entitled,weight,PoolIdle,usedAllCPU%,usedPoolCPU%,SharedCPU,Capped,EC_User%',
];

export const AIX_SAMPLES: AixSample[] = [
  { cpu: 1.5, vp: 4, pool: 16, entitled: 2, weight: 128, poolIdle: 10, capped: 0 },
  { cpu: 2.5, vp: 4, pool: 16, entitled: 2, weight: 128, poolIdle: 8, capped: 0 },
  { cpu: 0.5, vp: 6, pool: 14, entitled: 3, weight: 64, poolIdle: 9, capped: 1 },
];

/** AIX log: three LPAR samples, PROC run queue 2/4/6, MEM used 2048 and 3072. */
export function aixLog(): string {
  return [
    ...AIX_HEADER,
    ...AIX_SAMPLES.map((s, i) => aixLpar(`T000${i + 1}`, s)),
    'PROC,T0001,2,0.5',
    'PROC,T0002,4,0.5',
    'PROC,T0003,6,0.5',
    record('MEM', 'T0001', 8, { 4: 2048, 6: 4096 }),
    record('MEM', 'T0002', 8, { 4: 1024, 6: 4096 }),
  ].join('\n');
}

export const LINUX_SAMPLES: LinuxSample[] = [
  { cpu: 10, capped: 0, pool: 400, entitled: 1.5, vp: 2, weight: 100, poolIdle: 3 },
  { cpu: 30, capped: 1, pool: 200, entitled: 0.5, vp: 2, weight: 100, poolIdle: 1 },
];

/** Linux log: two LPAR samples, one PROC sample of 3, one MEM sample using 2048. */
export function linuxLog(): string {
  return [
    'AAA,progname,nmon',
    'AAA,date,20-OCT-2026',
    'BBBL,04,lparname,db02',
    ...LINUX_SAMPLES.map((s, i) => linuxLpar(`T000${i + 1}`, s)),
    'PROC,T0001,3,1',
    record('MEM', 'T0001', 8, { 2: 8192, 7: 6144 }),
  ].join('\r\n');
}

export function createRecordingLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    logFileOutcome: vi.fn(),
    logProgress: vi.fn(),
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'nmon-summary-'));
}
