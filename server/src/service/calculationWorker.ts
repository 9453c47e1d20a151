// src/service/calculationWorker.ts
//
// 目的:
// - キューから受け取った確率モードの作業単位を 1 件処理するハンドラ。
//   pending/failed → processing → completed | failed
// 前後関係:
// - リトライ・タイムアウト・試行回数の管理は service/workerPool.ts が行う。
//   ここでは例外を投げ直してプールに判断を委ねる。
// - 進捗は 3 か所に流す（順序は保証しない）:
//   - キャッシュ calc:progress:{id}（TTL 付き、ポーリング用）
//   - レコード（前回保存から persistIntervalPercent 以上進んだときと 100% のとき）
//   - 通知 case.{caseId}.calculations
// - レコードに cancelledAt が入ったら進捗のたびに検知して中断する。
import {
  pickKeyMetrics,
  type CalculationResult,
  type CalculationWorkUnit,
} from '@/model/calculation';
import { isTerminalStatus } from '@/model/calculationRecord';
import {
  CalculationCancelledError,
  InvalidStatusTransitionError,
  errorMessage,
  errorTrace,
} from '@/model/errors';
import { caseTopic } from '@/model/notification';
import type { CalculationPipeline } from '@/engine/pipeline';
import { logger } from '@/logger';
import type { CacheStore } from './cacheStore';
import type { CaseBindingService } from './caseBindingService';
import type { CalculationStore } from './calculationStore';
import { toCompletionUpdate } from './calculationResultMapper';
import type { Notifier } from './notifier';

export const DEFAULT_PROGRESS_TTL_SECONDS = 300;
export const DEFAULT_PERSIST_INTERVAL_PERCENT = 5;

export const progressCacheKey = (calculationId: string): string =>
  `calc:progress:${calculationId}`;

export interface ProgressSnapshot {
  percentage: number;
  message: string;
  updatedAt: string;
}

export interface JobContext {
  attempt: number;
  maxAttempts: number;
  signal?: AbortSignal;
}

export type JobHandlerOutcome = 'completed' | 'skipped';

export interface CalculationJobHandler {
  handle(unit: CalculationWorkUnit, context: JobContext): Promise<JobHandlerOutcome>;
  // リトライを使い切ったときに一度だけ呼ばれる。これ自体はリトライしない。
  onPermanentFailure(unit: CalculationWorkUnit, error: unknown): Promise<void>;
}

export interface CalculationJobHandlerDeps {
  store: CalculationStore;
  pipeline: CalculationPipeline;
  binding: CaseBindingService;
  notifier: Notifier;
  progressCache: CacheStore<ProgressSnapshot>;
  progressTtlSeconds?: number;
  persistIntervalPercent?: number;
  now?: () => Date;
}

export const createCalculationJobHandler = ({
  store,
  pipeline,
  binding,
  notifier,
  progressCache,
  progressTtlSeconds = DEFAULT_PROGRESS_TTL_SECONDS,
  persistIntervalPercent = DEFAULT_PERSIST_INTERVAL_PERCENT,
  now = () => new Date(),
}: CalculationJobHandlerDeps): CalculationJobHandler => {
  const publishFailed = async (
    calculationId: string,
    caseId: number,
    message: string
  ) => {
    await notifier.publish(caseTopic(caseId), {
      event: 'calculation.failed',
      payload: {
        calculation_id: calculationId,
        error: message,
        timestamp: now().toISOString(),
      },
    });
  };

  const isCancelled = async (calculationId: string) => {
    const latest = await store.findCalculation(calculationId);
    return Boolean(latest?.cancelledAt);
  };

  const markFailed = async (calculationId: string, error: unknown) => {
    const message = errorMessage(error);
    try {
      await store.updateCalculation(calculationId, {
        status: 'failed',
        progressMessage: `Calculation failed: ${message}`,
        failedAt: now(),
        errorMessage: message,
        errorTrace: errorTrace(error),
      });
    } catch (updateError) {
      if (updateError instanceof InvalidStatusTransitionError) {
        logger.warn('Calculation status changed while failing', {
          calculationId,
          from: updateError.from,
        });
        return;
      }
      throw updateError;
    }
  };

  const clearProgress = async (key: string) => {
    try {
      await progressCache.delete(key);
    } catch (error) {
      logger.error('Failed to clear progress entry', { key }, error);
    }
  };

  return {
    async handle(unit, context) {
      const { calculationId } = unit;
      const record = await store.findCalculation(calculationId);
      if (!record) {
        logger.warn('Calculation record not found; skipping job', { calculationId });
        return 'skipped';
      }
      if (isTerminalStatus(record.status) || record.cancelledAt) {
        logger.log('Calculation already finished or cancelled; skipping job', {
          calculationId,
          status: record.status,
        });
        return 'skipped';
      }

      const caseId = record.caseId;
      const input = record.inputParams ?? unit.input;
      const topic = caseTopic(caseId);
      const key = progressCacheKey(calculationId);

      await store.updateCalculation(calculationId, {
        status: 'processing',
        startedAt: now(),
        progressPercentage: 0,
        progressMessage: `Starting calculation (attempt ${context.attempt}/${context.maxAttempts})`,
        failedAt: null,
        errorMessage: null,
        errorTrace: null,
      });
      logger.log('Calculation started', {
        calculationId,
        caseId,
        attempt: context.attempt,
        iterations: input.iterations,
      });

      const controller = new AbortController();
      const forwardAbort = () => controller.abort(context.signal?.reason);
      if (context.signal?.aborted) {
        forwardAbort();
      } else {
        context.signal?.addEventListener('abort', forwardAbort, { once: true });
      }

      let lastPersisted = 0;
      const onProgress = async (percentage: number, message: string) => {
        await progressCache.set(
          key,
          { percentage, message, updatedAt: now().toISOString() },
          progressTtlSeconds
        );

        if (await isCancelled(calculationId)) {
          throw new CalculationCancelledError(calculationId);
        }

        if (
          percentage - lastPersisted >= persistIntervalPercent ||
          (percentage === 100 && lastPersisted !== 100)
        ) {
          await store.updateCalculation(calculationId, {
            progressPercentage: percentage,
            progressMessage: message,
          });
          lastPersisted = percentage;
        }

        await notifier.publish(topic, {
          event: 'calculation.progress',
          payload: {
            calculation_id: calculationId,
            case_id: caseId,
            percentage,
            message,
            timestamp: now().toISOString(),
          },
        });
      };

      let result: CalculationResult;
      try {
        result = await pipeline.runStochastic(input, {
          onProgress,
          signal: controller.signal,
        });

        await store.transaction(async (session) => {
          await session.updateCalculation(
            calculationId,
            toCompletionUpdate(result, now())
          );
          await binding.bindCalculationToCase(caseId, calculationId, session);
        });
      } catch (error) {
        // 完了直前にキャンセルされた場合も遷移エラーではなくキャンセルとして扱う
        if (
          error instanceof CalculationCancelledError ||
          (await isCancelled(calculationId))
        ) {
          const cancelled =
            error instanceof CalculationCancelledError
              ? error
              : new CalculationCancelledError(calculationId);
          logger.log('Calculation cancelled', { calculationId, caseId });
          await publishFailed(calculationId, caseId, cancelled.message);
          await clearProgress(key);
          throw cancelled;
        }

        logger.error(
          'Calculation failed',
          { calculationId, caseId, attempt: context.attempt },
          error
        );
        await markFailed(calculationId, error);
        await publishFailed(calculationId, caseId, errorMessage(error));
        await clearProgress(key);
        throw error;
      } finally {
        context.signal?.removeEventListener('abort', forwardAbort);
      }

      // ここから先はコミット済み。失敗しても completed のまま返す
      try {
        await notifier.publish(topic, {
          event: 'calculation.completed',
          payload: {
            calculation_id: calculationId,
            results: pickKeyMetrics(result.finalMetrics),
            timestamp: now().toISOString(),
          },
        });
      } catch (error) {
        logger.error('Completion notification failed', { calculationId, caseId }, error);
      }
      await clearProgress(key);
      logger.log('Calculation completed', {
        calculationId,
        caseId,
        executionTimeSeconds: result.executionTimeSeconds,
      });
      return 'completed';
    },

    async onPermanentFailure(unit, error) {
      const { calculationId } = unit;
      const record = await store.findCalculation(calculationId);
      if (!record) {
        logger.warn('Calculation record not found for permanent failure', {
          calculationId,
        });
        return;
      }
      if (record.status === 'permanently_failed' || record.status === 'completed') {
        return;
      }

      await store.updateCalculation(calculationId, {
        status: 'permanently_failed',
        errorMessage: errorMessage(error),
        errorTrace: errorTrace(error) ?? record.errorTrace,
        failedAt: record.failedAt ?? now(),
      });
      logger.error('Calculation permanently failed', {
        calculationId,
        caseId: record.caseId,
        error: errorMessage(error),
      });
    },
  };
};
