// src/service/workerPool.ts
//
// 目的:
// - キューから作業単位を lease し、ハンドラに渡してリトライ方針を適用する。
//   - 試行回数: maxAttempts（既定 3）。超えたら onPermanentFailure を呼んで fail
//   - バックオフ: 固定 backoffSeconds（既定 60 秒）
//   - 1 試行のタイムアウト: timeoutSeconds（既定 3600 秒）。signal で中断を伝える
//   - キャンセルされた試行は ack してリトライしない
// 前後関係:
// - index.ts のワーカープロセスが start()/stop() を呼ぶ。テストは runOnce() を直接使う。
import { randomUUID } from 'node:crypto';
import type { CalculationWorkUnit } from '@/model/calculation';
import {
  CalculationCancelledError,
  CalculationTimeoutError,
  errorMessage,
} from '@/model/errors';
import { logger } from '@/logger';
import type { CalculationJobHandler } from './calculationWorker';
import type { LeasedJob, WorkQueue } from './workQueue';

export type RunOutcome =
  | 'idle'
  | 'completed'
  | 'skipped'
  | 'retried'
  | 'failed'
  | 'cancelled';

export interface WorkerPoolOptions {
  queue: WorkQueue<CalculationWorkUnit>;
  handler: CalculationJobHandler;
  owner?: string;
  timeoutSeconds?: number;
  backoffSeconds?: number;
  visibilityTimeoutSeconds?: number;
  concurrency?: number;
  pollIntervalMs?: number;
}

export interface WorkerPool {
  runOnce(): Promise<RunOutcome>;
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
}

// タイムアウトしたら signal を中断し、CalculationTimeoutError で reject する。
// 元の処理が後から失敗しても未処理の reject にならないようにログだけ残す。
const withTimeout = <T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutSeconds: number
): Promise<T> => {
  const controller = new AbortController();
  const running = work(controller.signal);

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CalculationTimeoutError(timeoutSeconds);
      controller.abort(error);
      reject(error);
    }, timeoutSeconds * 1000);
  });

  running.catch((error: unknown) => {
    if (controller.signal.aborted) {
      logger.debug('Timed-out attempt settled', errorMessage(error));
    }
  });

  return Promise.race([running, timeout]).finally(() => clearTimeout(timer));
};

export const createWorkerPool = ({
  queue,
  handler,
  owner = `worker-${process.pid}-${randomUUID().slice(0, 8)}`,
  timeoutSeconds = 3600,
  backoffSeconds = 60,
  visibilityTimeoutSeconds = timeoutSeconds + 300,
  concurrency = 1,
  pollIntervalMs = 1000,
}: WorkerPoolOptions): WorkerPool => {
  let running = false;
  let loops: Promise<void>[] = [];
  const sleepers = new Set<() => void>();

  const sleep = (ms: number) =>
    new Promise<void>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      sleepers.add(wake);
    });

  const handleFailure = async (
    job: LeasedJob<CalculationWorkUnit>,
    error: unknown
  ): Promise<RunOutcome> => {
    const message = errorMessage(error);

    if (error instanceof CalculationCancelledError) {
      await queue.complete(job.id);
      return 'cancelled';
    }

    if (job.attempts < job.maxAttempts) {
      await queue.retry(job.id, backoffSeconds, message);
      logger.warn('Calculation attempt failed; retry scheduled', {
        jobId: job.id,
        calculationId: job.payload.calculationId,
        attempt: job.attempts,
        maxAttempts: job.maxAttempts,
        backoffSeconds,
      });
      return 'retried';
    }

    await queue.fail(job.id, message);
    try {
      await handler.onPermanentFailure(job.payload, error);
    } catch (hookError) {
      logger.error(
        'Permanent failure hook failed',
        { jobId: job.id, calculationId: job.payload.calculationId },
        hookError
      );
    }
    return 'failed';
  };

  const runOnce = async (): Promise<RunOutcome> => {
    const job = await queue.lease({ owner, visibilityTimeoutSeconds });
    if (!job) return 'idle';

    logger.debug('Leased calculation job', {
      jobId: job.id,
      calculationId: job.payload.calculationId,
      tags: job.payload.tags,
      attempt: job.attempts,
    });

    try {
      const outcome = await withTimeout(
        (signal) =>
          handler.handle(job.payload, {
            attempt: job.attempts,
            maxAttempts: job.maxAttempts,
            signal,
          }),
        timeoutSeconds
      );
      await queue.complete(job.id);
      return outcome;
    } catch (error) {
      return handleFailure(job, error);
    }
  };

  const loop = async () => {
    while (running) {
      try {
        const outcome = await runOnce();
        if (outcome === 'idle' && running) {
          await sleep(pollIntervalMs);
        }
      } catch (error) {
        logger.error('Worker loop error', { owner }, error);
        if (running) await sleep(pollIntervalMs);
      }
    }
  };

  return {
    runOnce,

    start() {
      if (running) return;
      running = true;
      loops = Array.from({ length: Math.max(1, concurrency) }, () => loop());
      logger.log('Worker pool started', { owner, queue: queue.name, concurrency });
    },

    async stop() {
      if (!running) return;
      running = false;
      for (const wake of sleepers) wake();
      await Promise.all(loops);
      loops = [];
      logger.log('Worker pool stopped', { owner });
    },

    isRunning: () => running,
  };
};
