import type { SystemInfo, SystemInfoField } from './types';

export const NOT_AVAILABLE = 'N/A';

interface HeaderRule {
  field: SystemInfoField;
  marker: string;
  extract(line: string): string | undefined;
}

const afterLastColon = (line: string): string => {
  const parts = line.split(':');
  return stripQuotes(parts[parts.length - 1].trim());
};

const stripQuotes = (value: string): string => value.replace(/^"+|"+$/g, '');

const HEADER_RULES: HeaderRule[] = [
  {
    field: 'Date',
    marker: 'AAA,date',
    extract: line => line.split(',')[2],
  },
  {
    field: 'LPAR Name',
    marker: 'lparname',
    extract: line => line.split(',')[3]?.trim(),
  },
  {
    field: 'System Model',
    marker: 'System Model:',
    extract: line => afterLastColon(line).split(',')[1],
  },
  {
    field: 'Machine Serial Number',
    marker: 'Machine Serial Number:',
    extract: line => afterLastColon(line),
  },
  {
    field: 'Processor Type',
    marker: 'Processor Type:',
    extract: line => afterLastColon(line).split('_')[1],
  },
];

/**
 * Applies every header rule to one non-metric line, writing matches into
 * systemInfo. A rule whose segment is missing leaves the field as it was.
 */
export function extractHeader(line: string, systemInfo: SystemInfo): void {
  for (const rule of HEADER_RULES) {
    if (!line.includes(rule.marker)) continue;

    const value = rule.extract(line);
    if (value !== undefined) {
      systemInfo[rule.field] = value;
    }
  }
}

export function readSystemInfo(systemInfo: SystemInfo, field: SystemInfoField): string {
  return systemInfo[field] ?? NOT_AVAILABLE;
}
