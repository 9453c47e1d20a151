// src/service/pgWorkQueue.ts
//
// 目的:
// - WorkQueue の Postgres 実装（calculation_jobs テーブル）。
// - lease は FOR UPDATE SKIP LOCKED で 1 行だけ取り、複数ワーカーが同じジョブを掴まないようにする。
//   visibility timeout が切れた leased 行も再配信対象に含める。
// 前後関係:
// - ペイロードは JSONB で保存し、取り出すときに decode で検証する。
import { randomUUID } from 'node:crypto';
import type { CalculationWorkUnit } from '@/model/calculation';
import { isRecord, parseCalculationInput } from '@/model/guards';
import {
  readDate,
  readJson,
  readNumber,
  readString,
  type Queryable,
} from './sqlClient';
import { DEFAULT_MAX_ATTEMPTS, type WorkQueue } from './workQueue';

const LEASE_SQL = `
WITH next_job AS (
  SELECT id
    FROM calculation_jobs
   WHERE queue = $1
     AND ((status = 'queued' AND available_at <= now())
       OR (status = 'leased' AND leased_until <= now()))
   ORDER BY available_at
   LIMIT 1
   FOR UPDATE SKIP LOCKED
)
UPDATE calculation_jobs AS j
   SET status = 'leased',
       attempts = j.attempts + 1,
       leased_by = $2,
       leased_until = now() + make_interval(secs => $3),
       updated_at = now()
  FROM next_job
 WHERE j.id = next_job.id
RETURNING j.id, j.queue, j.payload, j.attempts, j.max_attempts, j.leased_until`;

export const decodeWorkUnit = (payload: unknown): CalculationWorkUnit => {
  if (!isRecord(payload) || typeof payload.calculationId !== 'string') {
    throw new Error('ジョブのペイロードが不正です');
  }
  const tags = Array.isArray(payload.tags)
    ? payload.tags.filter((tag): tag is string => typeof tag === 'string')
    : [];
  return {
    calculationId: payload.calculationId,
    input: parseCalculationInput(payload.input),
    tags,
  };
};

export interface PgWorkQueueOptions<T> {
  db: Queryable;
  name?: string;
  decode: (payload: unknown) => T;
}

export const createPgWorkQueue = <T>({
  db,
  name = 'calculations',
  decode,
}: PgWorkQueueOptions<T>): WorkQueue<T> => ({
  name,

  async enqueue(payload, options = {}) {
    const id = randomUUID();
    await db.query(
      `INSERT INTO calculation_jobs (id, queue, payload, max_attempts, available_at)
       VALUES ($1, $2, $3::jsonb, $4, now() + make_interval(secs => $5))`,
      [
        id,
        name,
        JSON.stringify(payload),
        options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
        options.delaySeconds ?? 0,
      ]
    );
    return id;
  },

  async lease({ owner, visibilityTimeoutSeconds }) {
    const { rows } = await db.query(LEASE_SQL, [name, owner, visibilityTimeoutSeconds]);
    const row = rows[0];
    if (!row) return null;
    return {
      id: readString(row, 'id'),
      queue: readString(row, 'queue'),
      payload: decode(readJson(row, 'payload')),
      attempts: readNumber(row, 'attempts'),
      maxAttempts: readNumber(row, 'max_attempts'),
      leasedUntil: readDate(row, 'leased_until'),
    };
  },

  async complete(jobId) {
    await db.query(
      `UPDATE calculation_jobs
          SET status = 'completed', leased_until = NULL, updated_at = now()
        WHERE id = $1`,
      [jobId]
    );
  },

  async retry(jobId, delaySeconds, error) {
    await db.query(
      `UPDATE calculation_jobs
          SET status = 'queued',
              available_at = now() + make_interval(secs => $2),
              leased_until = NULL,
              leased_by = NULL,
              last_error = $3,
              updated_at = now()
        WHERE id = $1`,
      [jobId, delaySeconds, error]
    );
  },

  async fail(jobId, error) {
    await db.query(
      `UPDATE calculation_jobs
          SET status = 'failed', leased_until = NULL, last_error = $2, updated_at = now()
        WHERE id = $1`,
      [jobId, error]
    );
  },
});
