import { logger } from '@/logger';
import { errorMessage } from '@/model/errors';
import { readString, type Queryable, type SqlPool } from '@/service/sqlClient';

export const CALCULATION_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS cases (
  id BIGINT PRIMARY KEY,
  current_calculation_id UUID NULL,
  current_calculation_fingerprint CHAR(64) NULL,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS calculations (
  id UUID PRIMARY KEY,
  case_id BIGINT NOT NULL REFERENCES cases(id) ON DELETE CASCADE,
  fingerprint CHAR(64) NOT NULL,
  mode TEXT NOT NULL CHECK (mode IN ('deterministic', 'stochastic')),
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'processing', 'completed', 'failed', 'permanently_failed')),
  input_params JSONB NULL,
  progress_percentage SMALLINT NOT NULL DEFAULT 0
    CHECK (progress_percentage BETWEEN 0 AND 100),
  progress_message TEXT NULL,
  iterations_total INTEGER NULL,
  iterations_completed INTEGER NULL,
  started_at TIMESTAMPTZ NULL,
  completed_at TIMESTAMPTZ NULL,
  failed_at TIMESTAMPTZ NULL,
  cancelled_at TIMESTAMPTZ NULL,
  execution_time_seconds DOUBLE PRECISION NULL,
  engineering_results JSONB NULL,
  production_results JSONB NULL,
  sales_results JSONB NULL,
  capex_results JSONB NULL,
  opex_results JSONB NULL,
  tax_results JSONB NULL,
  final_metrics JSONB NULL,
  distributions JSONB NULL,
  error_message TEXT NULL,
  error_trace TEXT NULL,
  detach_at TIMESTAMPTZ NULL,
  delete_at TIMESTAMPTZ NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  CHECK (detach_at IS NULL OR delete_at IS NULL OR detach_at < delete_at)
);

CREATE INDEX IF NOT EXISTS calculations_fingerprint_status_idx
  ON calculations (fingerprint, status, completed_at DESC);
CREATE INDEX IF NOT EXISTS calculations_case_id_idx
  ON calculations (case_id);
CREATE INDEX IF NOT EXISTS calculations_delete_at_idx
  ON calculations (delete_at) WHERE delete_at IS NOT NULL;

DO $$
BEGIN
  IF NOT EXISTS (
    SELECT 1 FROM pg_constraint WHERE conname = 'cases_current_calculation_fk'
  ) THEN
    ALTER TABLE cases
      ADD CONSTRAINT cases_current_calculation_fk
      FOREIGN KEY (current_calculation_id)
      REFERENCES calculations(id) ON DELETE SET NULL;
  END IF;
END
$$;

CREATE TABLE IF NOT EXISTS calculation_jobs (
  id UUID PRIMARY KEY,
  queue TEXT NOT NULL,
  payload JSONB NOT NULL,
  status TEXT NOT NULL DEFAULT 'queued'
    CHECK (status IN ('queued', 'leased', 'completed', 'failed')),
  attempts INTEGER NOT NULL DEFAULT 0,
  max_attempts INTEGER NOT NULL DEFAULT 3,
  available_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  leased_until TIMESTAMPTZ NULL,
  leased_by TEXT NULL,
  last_error TEXT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS calculation_jobs_ready_idx
  ON calculation_jobs (queue, status, available_at);
`;

export const CALCULATION_TABLES = ['cases', 'calculations', 'calculation_jobs'] as const;

export type CalculationTable = (typeof CALCULATION_TABLES)[number];

export interface SchemaReport {
  created: CalculationTable[];
  existing: CalculationTable[];
}

const PRESENT_TABLES_SQL = `SELECT table_name
  FROM information_schema.tables
 WHERE table_schema = current_schema()
   AND table_name = ANY($1::text[])`;

const listPresentTables = async (db: Queryable): Promise<CalculationTable[]> => {
  const { rows } = await db.query(PRESENT_TABLES_SQL, [[...CALCULATION_TABLES]]);
  const names = rows.map((row) => readString(row, 'table_name'));
  return CALCULATION_TABLES.filter((table) => names.includes(table));
};

// DDL を 1 トランザクションで流し、新しく作ったテーブルと既にあったテーブルを返す。
// 流した後に揃っていないテーブルがあればロールバックする。
export const applyCalculationSchema = async (pool: SqlPool): Promise<SchemaReport> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const before = await listPresentTables(client);
    await client.query(CALCULATION_SCHEMA_SQL);
    const after = await listPresentTables(client);
    const missing = CALCULATION_TABLES.filter((table) => !after.includes(table));
    if (missing.length > 0) {
      throw new Error(`テーブルが作成されていません: ${missing.join(', ')}`);
    }
    await client.query('COMMIT');
    return {
      created: CALCULATION_TABLES.filter((table) => !before.includes(table)),
      existing: before,
    };
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error('Failed to rollback schema transaction', errorMessage(rollbackError));
    });
    throw error;
  } finally {
    client.release();
  }
};
