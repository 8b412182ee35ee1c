import { SUMMARY_TABLE_NAME, assertTableName, summaryTableDdl } from '../config/database';
import { REPORT_COLUMNS, type ReportRow, toReportValues } from '../core/report';
import type { ReportSink } from './types';

export interface SummaryClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  // an error tells pg to discard the connection instead of pooling it
  release(err?: Error): void;
}

/** The slice of pg.Pool the sink needs. */
export interface SummaryPool {
  connect(): Promise<SummaryClient>;
  end(): Promise<void>;
}

export interface PostgresSinkOptions {
  pool: SummaryPool;
  runId: string;
  table?: string;
}

export function insertSummaryQuery(table: string): string {
  const columns = ['run_id', ...REPORT_COLUMNS.map(column => column.id)];
  const placeholders = columns.map((_, i) => `$${i + 1}`);
  return `
    INSERT INTO ${table} (
      ${columns.join(', ')}
    ) VALUES (
      ${placeholders.join(', ')}
    )
    ON CONFLICT (run_id, nmonfile) DO NOTHING
  `;
}

/**
 * Loads report rows into Postgres in one transaction, replacing whatever an
 * earlier attempt of the same run left behind.
 */
export class PostgresReportSink implements ReportSink {
  public readonly name = 'postgres';
  private pool: SummaryPool;
  private runId: string;
  private table: string;

  constructor(options: PostgresSinkOptions) {
    this.pool = options.pool;
    this.runId = options.runId;
    this.table = assertTableName(options.table ?? SUMMARY_TABLE_NAME);
  }

  public async write(rows: ReportRow[]): Promise<void> {
    const client = await this.pool.connect();
    const insertQuery = insertSummaryQuery(this.table);
    let brokenConnection: Error | undefined;

    try {
      await client.query('BEGIN');
      await client.query(summaryTableDdl(this.table));
      await client.query(`DELETE FROM ${this.table} WHERE run_id = $1`, [this.runId]);

      for (const row of rows) {
        await client.query(insertQuery, [this.runId, ...toReportValues(row)]);
      }

      await client.query('COMMIT');
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // the insert error stays the one reported
        brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw error;
    } finally {
      client.release(brokenConnection);
    }
  }

  public async close(): Promise<void> {
    await this.pool.end();
  }
}
