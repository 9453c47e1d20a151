// src/service/calculationService.ts
//
// 目的:
// - 計算の受付窓口。HTTP 層などの呼び出し元はこのサービスだけを使う。
//   - submit: 重複排除 → モードに応じた戦略で実行
//   - getStatus / getResults / cancel / invalidateCache
// 前後関係:
// - 対話モード: service/strategies/interactiveStrategy.ts（キャッシュ）
// - 確率モード: service/strategies/stochasticStrategy.ts（レコード + キュー）
import type { CalculationInput, CalculationResult } from '@/model/calculation';
import type {
  CalculationRecord,
  CalculationStatus,
} from '@/model/calculationRecord';
import { CalculationNotFoundError } from '@/model/errors';
import { logger } from '@/logger';
import type { CacheStore } from './cacheStore';
import type { CaseBindingService } from './caseBindingService';
import type { CalculationStore } from './calculationStore';
import { toCalculationResult } from './calculationResultMapper';
import { progressCacheKey, type ProgressSnapshot } from './calculationWorker';
import type { CalculationStrategy, StrategyOutcome } from './strategies/types';

export const CANCELLED_MESSAGE = 'Cancelled by user';

export type SubmitOutcome =
  | StrategyOutcome
  | {
      kind: 'existing';
      calculationId: string;
      fingerprint: string;
      result: CalculationResult | null;
    };

export interface CalculationStatusView {
  calculationId: string;
  caseId: number;
  fingerprint: string;
  status: CalculationStatus;
  progressPercentage: number;
  progressMessage: string | null;
  iterationsCompleted: number | null;
  iterationsTotal: number | null;
  startedAt: string | null;
  completedAt: string | null;
  executionTimeSeconds: number | null;
  result: CalculationResult | null;
}

export interface CalculationServiceDeps {
  store: CalculationStore;
  binding: CaseBindingService;
  interactive: CalculationStrategy & {
    invalidateCache(input: CalculationInput): Promise<void>;
  };
  stochastic: CalculationStrategy;
  progressCache: CacheStore<ProgressSnapshot>;
  defaultStochasticIterations?: number;
  now?: () => Date;
}

export interface CalculationService {
  submit(input: CalculationInput): Promise<SubmitOutcome>;
  getStatus(calculationId: string): Promise<CalculationStatusView>;
  getResults(calculationId: string): Promise<CalculationResult | null>;
  cancel(calculationId: string): Promise<boolean>;
  invalidateCache(input: CalculationInput): Promise<void>;
}

const toIso = (value: Date | null) => (value ? value.toISOString() : null);

export const createCalculationService = ({
  store,
  binding,
  interactive,
  stochastic,
  progressCache,
  defaultStochasticIterations = 1000,
  now = () => new Date(),
}: CalculationServiceDeps): CalculationService => {
  // 決定論モードは 1 回、確率モードは既定の反復数
  const withDefaults = (input: CalculationInput): CalculationInput => ({
    ...input,
    iterations:
      input.iterations ??
      (input.mode === 'stochastic' ? defaultStochasticIterations : 1),
  });

  const requireRecord = async (calculationId: string) => {
    const record = await store.findCalculation(calculationId);
    if (!record) {
      throw new CalculationNotFoundError(calculationId);
    }
    return record;
  };

  const toStatusView = (
    record: CalculationRecord,
    progress: ProgressSnapshot | null
  ): CalculationStatusView => {
    // キャッシュの進捗は処理中で、かつ DB より進んでいるときだけ採用する
    const fresher =
      progress !== null &&
      record.status === 'processing' &&
      progress.percentage > record.progressPercentage;
    return {
      calculationId: record.id,
      caseId: record.caseId,
      fingerprint: record.fingerprint,
      status: record.status,
      progressPercentage: fresher ? progress.percentage : record.progressPercentage,
      progressMessage: fresher ? progress.message : record.progressMessage,
      iterationsCompleted: record.iterationsCompleted,
      iterationsTotal: record.iterationsTotal,
      startedAt: toIso(record.startedAt),
      completedAt: toIso(record.completedAt),
      executionTimeSeconds: record.executionTimeSeconds,
      result: toCalculationResult(record),
    };
  };

  return {
    async submit(rawInput) {
      const input = withDefaults(rawInput);
      logger.log('Calculation request received', {
        caseId: input.caseId,
        mode: input.mode,
        iterations: input.iterations,
      });

      const existing = await binding.findExistingCalculation(input);
      if (existing) {
        return {
          kind: 'existing',
          calculationId: existing.id,
          fingerprint: existing.fingerprint,
          result: toCalculationResult(existing),
        };
      }

      const strategy = input.mode === 'stochastic' ? stochastic : interactive;
      try {
        return await strategy.execute(input);
      } catch (error) {
        logger.error(
          'Calculation submission failed',
          { caseId: input.caseId, strategy: strategy.name() },
          error
        );
        throw error;
      }
    },

    async getStatus(calculationId) {
      const record = await requireRecord(calculationId);
      const progress = await progressCache.get(progressCacheKey(calculationId));
      return toStatusView(record, progress);
    },

    async getResults(calculationId) {
      const record = await requireRecord(calculationId);
      return toCalculationResult(record);
    },

    async cancel(calculationId) {
      const record = await requireRecord(calculationId);
      if (record.status !== 'pending' && record.status !== 'processing') {
        logger.warn('Calculation cannot be cancelled', {
          calculationId,
          status: record.status,
        });
        return false;
      }
      const at = now();
      await store.updateCalculation(calculationId, {
        status: 'failed',
        cancelledAt: at,
        failedAt: at,
        errorMessage: CANCELLED_MESSAGE,
        progressMessage: CANCELLED_MESSAGE,
      });
      logger.log('Calculation cancelled', { calculationId });
      return true;
    },

    invalidateCache(input) {
      return interactive.invalidateCache(withDefaults(input));
    },
  };
};
