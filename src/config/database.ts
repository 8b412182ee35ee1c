import { Pool, PoolConfig } from 'pg';
import * as dotenv from 'dotenv';

dotenv.config();

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

// Table names are interpolated into DDL and DML, so only plain identifiers pass.
export function assertTableName(table: string): string {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new Error(`Invalid table name '${table}', expected letters, digits and underscores`);
  }
  return table;
}

export const SUMMARY_TABLE_NAME = process.env.SUMMARY_TABLE_NAME || 'nmon_summary';

export function targetDbConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    host: env.TARGET_DB_HOST || 'localhost',
    port: parseInt(env.TARGET_DB_PORT || '5432', 10),
    database: env.TARGET_DB_NAME || 'capacity',
    user: env.TARGET_DB_USER || 'postgres',
    password: env.TARGET_DB_PASSWORD || 'password',
    max: 4,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: parseInt(env.TARGET_DB_CONN_TIMEOUT_MS || '10000', 10),
  };
}

// Created on demand so a CSV-only run never opens a pool.
export function createTargetPool(config: PoolConfig = targetDbConfig()): Pool {
  return new Pool(config);
}

export function summaryTableDdl(table: string = SUMMARY_TABLE_NAME): string {
  assertTableName(table);
  return `
    CREATE TABLE IF NOT EXISTS ${table} (
      run_id VARCHAR(64) NOT NULL,
      nmonfile VARCHAR(500) NOT NULL,
      report_date VARCHAR(50),
      lpar_name VARCHAR(255),
      system_model VARCHAR(255),
      machine_serial VARCHAR(255),
      processor_type VARCHAR(255),

      snapshots INTEGER,
      vp DOUBLE PRECISION,
      entitled_cpu DOUBLE PRECISION,
      vp_e DOUBLE PRECISION,
      pool_cpu DOUBLE PRECISION,
      pool_idle DOUBLE PRECISION,
      weight DOUBLE PRECISION,
      capped DOUBLE PRECISION,
      total_cpu DOUBLE PRECISION,
      min_cpu DOUBLE PRECISION,
      avg_cpu DOUBLE PRECISION,
      max_cpu DOUBLE PRECISION,
      cpu_p95 DOUBLE PRECISION,
      run_queue_p95 DOUBLE PRECISION,

      mem_count INTEGER,
      mem_min_gb DOUBLE PRECISION,
      mem_avg_gb DOUBLE PRECISION,
      mem_max_gb DOUBLE PRECISION,
      mem_p95_gb DOUBLE PRECISION,

      loaded_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      PRIMARY KEY (run_id, nmonfile)
    );

    CREATE INDEX IF NOT EXISTS idx_${table}_lpar_name ON ${table}(lpar_name);
  `;
}
