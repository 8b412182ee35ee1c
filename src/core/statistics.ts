import type { RawRecord } from './types';

// Plain decimal notation only: no hex, binary, octal or Infinity.
const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

/**
 * Reads one column of a record as a decimal float. Missing columns, empty
 * fields and any other notation raise ConversionError.
 */
export function toNumber(record: RawRecord, index: number): number {
  const raw = record[index];
  if (raw === undefined) {
    throw new ConversionError(`column ${index} missing in ${record[0] ?? '?'},${record[1] ?? '?'}`);
  }

  const trimmed = raw.trim();
  if (!DECIMAL_FLOAT.test(trimmed)) {
    throw new ConversionError(`could not convert '${raw}' in column ${index} to float`);
  }
  return Number(trimmed);
}

export function column(records: RawRecord[], index: number): number[] {
  return records.map(record => toNumber(record, index));
}

export function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function min(values: number[]): number {
  if (values.length === 0) throw new ConversionError('min of empty series');
  return values.reduce((acc, v) => (v < acc ? v : acc));
}

export function max(values: number[]): number {
  if (values.length === 0) throw new ConversionError('max of empty series');
  return values.reduce((acc, v) => (v > acc ? v : acc));
}

export function mean(values: number[]): number {
  if (values.length === 0) throw new ConversionError('mean of empty series');
  return sum(values) / values.length;
}

/**
 * Quantile with linear interpolation between the two closest order
 * statistics: rank = q * (n - 1).
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) throw new ConversionError('quantile of empty series');

  const sorted = [...values].sort((a, b) => a - b);
  const rank = q * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}
