import type { ReportRow } from '../core/report';

export interface ReportSink {
  readonly name: string;
  write(rows: ReportRow[]): Promise<void>;
  close(): Promise<void>;
}
