#!/usr/bin/env node
// cases / calculations / calculation_jobs を作成し、作ったテーブルと既存のテーブルを表示する。
import process from 'node:process';
import pool from '../../api/db';
import { applyCalculationSchema } from '../util/sql/calculationSchema';

const usage = `Usage:
  npm run schema:create

Creates the calculation tables if they do not exist (idempotent).

Environment:
  Requires database connection variables (POSTGRES_*) to be configured.`;

const formatTables = (tables: readonly string[]) =>
  tables.length > 0 ? tables.join(', ') : '(none)';

async function main() {
  if (process.argv.includes('--help') || process.argv.includes('-h')) {
    console.info(usage);
    return;
  }

  try {
    const { created, existing } = await applyCalculationSchema(pool);
    console.info(`[schema:create] Created: ${formatTables(created)}`);
    console.info(`[schema:create] Already present: ${formatTables(existing)}`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error(
    '[schema:create] Failed:',
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
});
