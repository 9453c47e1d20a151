// src/service/pgCalculationStore.ts
//
// 目的:
// - CalculationStore の Postgres 実装（テーブル定義は util/sql/calculationSchema.ts）。
// 前後関係:
// - ステータス遷移は UPDATE の WHERE 句で検証し、0 行なら「存在しない」か
//   「遷移不可」かを読み直して判別する。
// - transaction() は pool から 1 接続を借りて BEGIN/COMMIT/ROLLBACK する。
import { randomUUID } from 'node:crypto';
import {
  allowedPreviousStatuses,
  type CalculationRecord,
  type CalculationRecordUpdate,
  type CalculationStatus,
  type CaseRecord,
} from '@/model/calculationRecord';
import type { CalculationMode } from '@/model/calculation';
import {
  CalculationNotFoundError,
  CaseNotFoundError,
  InvalidStatusTransitionError,
  errorMessage,
} from '@/model/errors';
import {
  parseCalculationInput,
  parseDistributions,
  parseFinalMetrics,
  parseStageResultMap,
} from '@/model/guards';
import { logger } from '@/logger';
import type { CalculationSession, CalculationStore } from './calculationStore';
import {
  readDate,
  readJson,
  readNullableDate,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString,
  type Queryable,
  type SqlPool,
} from './sqlClient';

const STATUSES: readonly CalculationStatus[] = [
  'pending',
  'processing',
  'completed',
  'failed',
  'permanently_failed',
];

const isStatus = (value: string): value is CalculationStatus =>
  STATUSES.some((status) => status === value);

const readStatus = (row: Record<string, unknown>): CalculationStatus => {
  const value = readString(row, 'status');
  if (!isStatus(value)) {
    throw new Error(`未知のステータスです: ${value}`);
  }
  return value;
};

const readMode = (row: Record<string, unknown>): CalculationMode => {
  const value = readString(row, 'mode');
  if (value !== 'deterministic' && value !== 'stochastic') {
    throw new Error(`未知の計算モードです: ${value}`);
  }
  return value;
};

export const mapCalculationRow = (
  row: Record<string, unknown>
): CalculationRecord => {
  const input = readJson(row, 'input_params');
  return {
    id: readString(row, 'id'),
    caseId: readNumber(row, 'case_id'),
    fingerprint: readString(row, 'fingerprint').trim(),
    mode: readMode(row),
    status: readStatus(row),
    inputParams: input === null ? null : parseCalculationInput(input),
    progressPercentage: readNumber(row, 'progress_percentage'),
    progressMessage: readNullableString(row, 'progress_message'),
    iterationsTotal: readNullableNumber(row, 'iterations_total'),
    iterationsCompleted: readNullableNumber(row, 'iterations_completed'),
    startedAt: readNullableDate(row, 'started_at'),
    completedAt: readNullableDate(row, 'completed_at'),
    failedAt: readNullableDate(row, 'failed_at'),
    cancelledAt: readNullableDate(row, 'cancelled_at'),
    executionTimeSeconds: readNullableNumber(row, 'execution_time_seconds'),
    engineeringResults: parseStageResultMap(readJson(row, 'engineering_results')),
    productionResults: parseStageResultMap(readJson(row, 'production_results')),
    salesResults: parseStageResultMap(readJson(row, 'sales_results')),
    capexResults: parseStageResultMap(readJson(row, 'capex_results')),
    opexResults: parseStageResultMap(readJson(row, 'opex_results')),
    taxResults: parseStageResultMap(readJson(row, 'tax_results')),
    finalMetrics: parseFinalMetrics(readJson(row, 'final_metrics')),
    distributions: parseDistributions(readJson(row, 'distributions')),
    errorMessage: readNullableString(row, 'error_message'),
    errorTrace: readNullableString(row, 'error_trace'),
    detachAt: readNullableDate(row, 'detach_at'),
    deleteAt: readNullableDate(row, 'delete_at'),
    createdAt: readDate(row, 'created_at'),
    updatedAt: readDate(row, 'updated_at'),
  };
};

const mapCaseRow = (row: Record<string, unknown>): CaseRecord => ({
  id: readNumber(row, 'id'),
  currentCalculationId: readNullableString(row, 'current_calculation_id'),
  currentCalculationFingerprint:
    readNullableString(row, 'current_calculation_fingerprint')?.trim() ?? null,
});

type UpdateField = keyof CalculationRecordUpdate;

const UPDATE_COLUMNS: Record<UpdateField, string> = {
  fingerprint: 'fingerprint',
  status: 'status',
  inputParams: 'input_params',
  progressPercentage: 'progress_percentage',
  progressMessage: 'progress_message',
  iterationsTotal: 'iterations_total',
  iterationsCompleted: 'iterations_completed',
  startedAt: 'started_at',
  completedAt: 'completed_at',
  failedAt: 'failed_at',
  cancelledAt: 'cancelled_at',
  executionTimeSeconds: 'execution_time_seconds',
  engineeringResults: 'engineering_results',
  productionResults: 'production_results',
  salesResults: 'sales_results',
  capexResults: 'capex_results',
  opexResults: 'opex_results',
  taxResults: 'tax_results',
  finalMetrics: 'final_metrics',
  distributions: 'distributions',
  errorMessage: 'error_message',
  errorTrace: 'error_trace',
  detachAt: 'detach_at',
  deleteAt: 'delete_at',
};

const JSON_FIELDS: ReadonlySet<UpdateField> = new Set<UpdateField>([
  'inputParams',
  'engineeringResults',
  'productionResults',
  'salesResults',
  'capexResults',
  'opexResults',
  'taxResults',
  'finalMetrics',
  'distributions',
]);

const isUpdateField = (key: string): key is UpdateField => key in UPDATE_COLUMNS;

export const buildUpdateStatement = (
  id: string,
  update: CalculationRecordUpdate
): { text: string; values: unknown[] } => {
  const values: unknown[] = [id];
  const assignments: string[] = [];

  for (const [key, value] of Object.entries(update)) {
    if (!isUpdateField(key) || value === undefined) continue;
    const json = JSON_FIELDS.has(key);
    values.push(json && value !== null ? JSON.stringify(value) : value);
    assignments.push(
      `${UPDATE_COLUMNS[key]} = $${values.length}${json ? '::jsonb' : ''}`
    );
  }
  assignments.push('updated_at = now()');

  let where = 'id = $1';
  if (update.status) {
    values.push([update.status, ...allowedPreviousStatuses(update.status)]);
    where += ` AND status = ANY($${values.length}::text[])`;
  }

  return {
    text: `UPDATE calculations SET ${assignments.join(', ')} WHERE ${where} RETURNING *`,
    values,
  };
};

const createSession = (db: Queryable): CalculationSession => ({
  async createCalculation(data) {
    const { rows } = await db.query(
      `INSERT INTO calculations
         (id, case_id, fingerprint, mode, status, input_params, iterations_total, iterations_completed)
       VALUES ($1, $2, $3, $4, 'pending', $5::jsonb, $6, 0)
       RETURNING *`,
      [
        randomUUID(),
        data.caseId,
        data.fingerprint,
        data.mode,
        data.inputParams === null ? null : JSON.stringify(data.inputParams),
        data.iterationsTotal,
      ]
    );
    return mapCalculationRow(rows[0]);
  },

  async findCalculation(id) {
    const { rows } = await db.query('SELECT * FROM calculations WHERE id = $1', [id]);
    return rows[0] ? mapCalculationRow(rows[0]) : null;
  },

  async updateCalculation(id, update) {
    const statement = buildUpdateStatement(id, update);
    const { rows } = await db.query(statement.text, statement.values);
    if (rows[0]) return mapCalculationRow(rows[0]);

    const current = await db.query('SELECT status FROM calculations WHERE id = $1', [id]);
    if (!current.rows[0]) {
      throw new CalculationNotFoundError(id);
    }
    throw new InvalidStatusTransitionError(
      readStatus(current.rows[0]),
      update.status ?? 'unknown'
    );
  },

  async deleteCalculation(id) {
    const result = await db.query('DELETE FROM calculations WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  },

  async findLatestCompletedByFingerprint(fingerprint) {
    const { rows } = await db.query(
      `SELECT * FROM calculations
        WHERE fingerprint = $1 AND status = 'completed' AND delete_at IS NULL
        ORDER BY completed_at DESC NULLS LAST
        LIMIT 1`,
      [fingerprint]
    );
    return rows[0] ? mapCalculationRow(rows[0]) : null;
  },

  async findDueForDeletion(now) {
    const { rows } = await db.query(
      `SELECT * FROM calculations
        WHERE delete_at IS NOT NULL AND delete_at <= $1
        ORDER BY delete_at`,
      [now]
    );
    return rows.map(mapCalculationRow);
  },

  async findCase(caseId, options = {}) {
    const { rows } = await db.query(
      `SELECT id, current_calculation_id, current_calculation_fingerprint
         FROM cases WHERE id = $1${options.forUpdate ? ' FOR UPDATE' : ''}`,
      [caseId]
    );
    return rows[0] ? mapCaseRow(rows[0]) : null;
  },

  async setCurrentCalculation(caseId, calculationId, fingerprint) {
    const result = await db.query(
      `UPDATE cases
          SET current_calculation_id = $2,
              current_calculation_fingerprint = $3,
              updated_at = now()
        WHERE id = $1`,
      [caseId, calculationId, fingerprint]
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new CaseNotFoundError(caseId);
    }
  },

  async countCaseCalculations(caseId) {
    const { rows } = await db.query(
      `SELECT count(*) AS total,
              count(*) FILTER (WHERE delete_at IS NULL) AS active,
              count(*) FILTER (WHERE status = 'completed') AS completed,
              count(*) FILTER (WHERE delete_at IS NOT NULL) AS scheduled_for_deletion
         FROM calculations
        WHERE case_id = $1`,
      [caseId]
    );
    const row = rows[0] ?? {};
    return {
      total: readNumber(row, 'total'),
      active: readNumber(row, 'active'),
      completed: readNumber(row, 'completed'),
      scheduled_for_deletion: readNumber(row, 'scheduled_for_deletion'),
    };
  },
});

export const createPgCalculationStore = (pool: SqlPool): CalculationStore => ({
  ...createSession(pool),

  async transaction(work) {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(createSession(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error('Failed to rollback transaction', errorMessage(rollbackError));
      });
      throw error;
    } finally {
      client.release();
    }
  },
});
