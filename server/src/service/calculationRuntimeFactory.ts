// src/service/calculationRuntimeFactory.ts
//
// 目的:
// - 設定値から計算サービス一式（パイプライン・戦略・バインド・ワーカー）を組み立てる。
// 前後関係:
// - 永続化・キュー・通知はアダプタを受け取る。本番は pg 実装、テストと CLI はメモリ実装。
// - index.ts（ワーカープロセス）と scripts/ から使う。
import type { CalculationResult, CalculationWorkUnit } from '@/model/calculation';
import type { CalculationSettings } from '@/config';
import {
  createCalculationPipeline,
  type CalculationPipeline,
} from '@/engine/pipeline';
import {
  createSeededRandom,
  createTriangularNoise,
  createUniformNoise,
  type NoisePolicy,
} from '@/engine/noise';
import { createInMemoryCacheStore, type CacheStore } from './cacheStore';
import {
  createCaseBindingService,
  type CaseBindingService,
} from './caseBindingService';
import {
  createCalculationService,
  type CalculationService,
} from './calculationService';
import type { CalculationStore } from './calculationStore';
import {
  createCalculationJobHandler,
  type ProgressSnapshot,
} from './calculationWorker';
import { createDisabledNotifier, type Notifier } from './notifier';
import { createInteractiveStrategy } from './strategies/interactiveStrategy';
import { createStochasticStrategy } from './strategies/stochasticStrategy';
import { createWorkerPool, type WorkerPool } from './workerPool';
import type { WorkQueue } from './workQueue';

export interface CalculationRuntimeDeps {
  settings: CalculationSettings;
  store: CalculationStore;
  queue: WorkQueue<CalculationWorkUnit>;
  notifier: Notifier;
  resultCache?: CacheStore<CalculationResult>;
  progressCache?: CacheStore<ProgressSnapshot>;
  now?: () => Date;
}

export interface CalculationRuntime {
  pipeline: CalculationPipeline;
  binding: CaseBindingService;
  service: CalculationService;
  workerPool: WorkerPool;
}

const createNoise = (settings: CalculationSettings['noise']): NoisePolicy =>
  settings.distribution === 'triangular'
    ? createTriangularNoise(settings.spread)
    : createUniformNoise(settings.spread);

export const createCalculationRuntime = ({
  settings,
  store,
  queue,
  notifier,
  resultCache = createInMemoryCacheStore<CalculationResult>(),
  progressCache = createInMemoryCacheStore<ProgressSnapshot>(),
  now = () => new Date(),
}: CalculationRuntimeDeps): CalculationRuntime => {
  const pipeline = createCalculationPipeline({
    noise: createNoise(settings.noise),
    random:
      settings.noise.seed === null
        ? Math.random
        : createSeededRandom(settings.noise.seed),
    discountRate: settings.discountRate,
  });

  const binding = createCaseBindingService({
    store,
    gracePeriodDays: settings.cleanup.gracePeriodDays,
    deleteAfterDays: settings.cleanup.deleteAfterDays,
    now,
  });

  const service = createCalculationService({
    store,
    binding,
    interactive: createInteractiveStrategy({
      pipeline,
      cache: resultCache,
      cacheTtlSeconds: settings.sync.cacheTtlSeconds,
    }),
    stochastic: createStochasticStrategy({
      store,
      queue,
      settings: {
        minIterations: settings.iterations.min,
        maxIterations: settings.iterations.max,
        defaultIterations: settings.iterations.default,
        maxAttempts: settings.async.retryAttempts,
      },
    }),
    progressCache,
    defaultStochasticIterations: settings.iterations.default,
    now,
  });

  const workerPool = createWorkerPool({
    queue,
    handler: createCalculationJobHandler({
      store,
      pipeline,
      binding,
      notifier: settings.broadcastingEnabled ? notifier : createDisabledNotifier(),
      progressCache,
      progressTtlSeconds: settings.progress.cacheTtlSeconds,
      persistIntervalPercent: settings.progress.persistIntervalPercent,
      now,
    }),
    timeoutSeconds: settings.async.timeoutSeconds,
    backoffSeconds: settings.async.retryBackoffSeconds,
    visibilityTimeoutSeconds: settings.async.visibilityTimeoutSeconds,
    concurrency: settings.worker.concurrency,
    pollIntervalMs: settings.worker.pollIntervalMs,
  });

  return { pipeline, binding, service, workerPool };
};
