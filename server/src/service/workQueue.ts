// src/service/workQueue.ts
//
// 目的:
// - 確率モードの作業単位を受け渡すキューの契約と、メモリ実装。
// - 配信は at-least-once。lease したジョブは visibility timeout が切れると再配信される。
// 前後関係:
// - 投入: service/strategies/stochasticStrategy.ts
// - 消費: service/workerPool.ts（lease → handler → complete/retry/fail）
// - Postgres 実装は service/pgWorkQueue.ts
import { randomUUID } from 'node:crypto';

export interface EnqueueOptions {
  delaySeconds?: number;
  maxAttempts?: number;
}

export interface LeaseOptions {
  owner: string;
  visibilityTimeoutSeconds: number;
}

export interface LeasedJob<T> {
  id: string;
  queue: string;
  payload: T;
  // この lease を含めた試行回数
  attempts: number;
  maxAttempts: number;
  leasedUntil: Date;
}

export interface WorkQueue<T> {
  readonly name: string;
  enqueue(payload: T, options?: EnqueueOptions): Promise<string>;
  lease(options: LeaseOptions): Promise<LeasedJob<T> | null>;
  complete(jobId: string): Promise<void>;
  retry(jobId: string, delaySeconds: number, error: string): Promise<void>;
  fail(jobId: string, error: string): Promise<void>;
}

export type QueuedJobStatus = 'queued' | 'leased' | 'completed' | 'failed';

export interface QueuedJob<T> {
  id: string;
  payload: T;
  status: QueuedJobStatus;
  attempts: number;
  maxAttempts: number;
  availableAt: number;
  leasedUntil: number | null;
  leasedBy: string | null;
  lastError: string | null;
}

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface InMemoryWorkQueueOptions {
  name?: string;
  now?: () => number;
}

const ensureJob = <T>(jobs: Map<string, QueuedJob<T>>, jobId: string) => {
  const job = jobs.get(jobId);
  if (!job) {
    throw new Error(`ジョブが見つかりません: ${jobId}`);
  }
  return job;
};

const isLeasable = <T>(job: QueuedJob<T>, at: number) =>
  (job.status === 'queued' && job.availableAt <= at) ||
  (job.status === 'leased' && job.leasedUntil !== null && job.leasedUntil <= at);

export const createInMemoryWorkQueue = <T>({
  name = 'calculations',
  now = Date.now,
}: InMemoryWorkQueueOptions = {}): WorkQueue<T> & {
  jobs: Map<string, QueuedJob<T>>;
} => {
  const jobs = new Map<string, QueuedJob<T>>();

  return {
    name,
    jobs,

    async enqueue(payload, options = {}) {
      const id = randomUUID();
      jobs.set(id, {
        id,
        payload: structuredClone(payload),
        status: 'queued',
        attempts: 0,
        maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
        availableAt: now() + (options.delaySeconds ?? 0) * 1000,
        leasedUntil: null,
        leasedBy: null,
        lastError: null,
      });
      return id;
    },

    async lease({ owner, visibilityTimeoutSeconds }) {
      const at = now();
      const candidate = Array.from(jobs.values())
        .filter((job) => isLeasable(job, at))
        .sort((a, b) => a.availableAt - b.availableAt)[0];
      if (!candidate) return null;

      candidate.status = 'leased';
      candidate.attempts += 1;
      candidate.leasedBy = owner;
      candidate.leasedUntil = at + visibilityTimeoutSeconds * 1000;

      return {
        id: candidate.id,
        queue: name,
        payload: structuredClone(candidate.payload),
        attempts: candidate.attempts,
        maxAttempts: candidate.maxAttempts,
        leasedUntil: new Date(candidate.leasedUntil),
      };
    },

    async complete(jobId) {
      const job = ensureJob(jobs, jobId);
      job.status = 'completed';
      job.leasedUntil = null;
    },

    async retry(jobId, delaySeconds, error) {
      const job = ensureJob(jobs, jobId);
      job.status = 'queued';
      job.availableAt = now() + delaySeconds * 1000;
      job.leasedUntil = null;
      job.leasedBy = null;
      job.lastError = error;
    },

    async fail(jobId, error) {
      const job = ensureJob(jobs, jobId);
      job.status = 'failed';
      job.leasedUntil = null;
      job.lastError = error;
    },
  };
};
