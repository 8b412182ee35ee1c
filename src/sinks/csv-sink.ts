import * as fs from 'fs';
import * as path from 'path';
import * as csvWriter from 'csv-writer';
import { REPORT_COLUMNS, type ReportRow } from '../core/report';
import type { ReportSink } from './types';

const CSV_HEADER = REPORT_COLUMNS.map(column => ({ id: column.id, title: column.title }));

export class CsvReportSink implements ReportSink {
  public readonly name = 'csv';
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  // The header is written even when no file produced a row.
  public async write(rows: ReportRow[]): Promise<void> {
    await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });

    if (rows.length === 0) {
      // writeRecords([]) would leave an empty record after the header
      const stringifier = csvWriter.createObjectCsvStringifier({ header: CSV_HEADER });
      await fs.promises.writeFile(this.filePath, stringifier.getHeaderString() ?? '');
      return;
    }

    const writer = csvWriter.createObjectCsvWriter({
      path: this.filePath,
      header: CSV_HEADER
    });

    await writer.writeRecords(rows);
  }

  public async close(): Promise<void> {}
}
