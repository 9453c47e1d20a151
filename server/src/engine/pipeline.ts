// src/engine/pipeline.ts
//
// 目的:
// - 6 ステージ（engineering → production → sales → capex/opex → taxes → 最終指標）を
//   決められた順序で実行する。
//   - deterministic: 1 回だけ実行し、全ステージの出力を返す
//   - stochastic: パラメータに乱数ノイズを掛けて N 回実行し、指標ごとの分布統計を返す
// 前後関係:
// - 対話モードは service/strategies/interactiveStrategy.ts から同期的に、
//   確率モードは service/calculationWorker.ts からキュー経由で呼ばれる。
// - 進捗は ProgressSink に (percentage, message) で通知する。
// - signal が中断されたらステージ間/反復ごとに例外を投げる。
import {
  METRIC_KEYS,
  type CalculationInput,
  type CalculationResult,
  type FinalMetrics,
  type MetricDistributions,
  type MetricKey,
  type ProgressSink,
  emptyStageResults,
} from '@/model/calculation';
import {
  CalculationCancelledError,
  InvalidCalculationInputError,
} from '@/model/errors';
import { logger } from '@/logger';
import { generateFingerprint } from '@/service/fingerprint';
import {
  DEFAULT_DISCOUNT_RATE,
  calculateFinalMetrics,
} from './financialMetrics';
import {
  createUniformNoise,
  perturbInput,
  type NoisePolicy,
  type RandomSource,
} from './noise';
import { referenceStages, type PipelineStages } from './stages';
import { summarizeDistribution } from './statistics';

export const DEFAULT_STOCHASTIC_ITERATIONS = 1000;

// 進捗通知は反復数のおよそ 5% ごと
const PROGRESS_STEPS = 20;

export interface PipelineOptions {
  stages?: PipelineStages;
  noise?: NoisePolicy;
  random?: RandomSource;
  discountRate?: number;
}

export interface PipelineRunOptions {
  onProgress?: ProgressSink;
  signal?: AbortSignal;
}

export interface CalculationPipeline {
  run(input: CalculationInput, options?: PipelineRunOptions): Promise<CalculationResult>;
  runDeterministic(
    input: CalculationInput,
    options?: PipelineRunOptions
  ): Promise<CalculationResult>;
  runStochastic(
    input: CalculationInput,
    options?: PipelineRunOptions
  ): Promise<CalculationResult>;
}

// 理由なしの abort()（AbortError）はキャンセル、それ以外は渡された例外をそのまま投げる
const throwIfAborted = (signal?: AbortSignal) => {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw reason instanceof Error && reason.name !== 'AbortError'
    ? reason
    : new CalculationCancelledError();
};

// タイマー（タイムアウト）やキャンセル確認を進められるよう、イベントループに一度戻す
const yieldToEventLoop = () =>
  new Promise<void>((resolve) => setImmediate(resolve));

const elapsedSeconds = (startedAt: number) =>
  (performance.now() - startedAt) / 1000;

export const resolveIterations = (input: CalculationInput): number => {
  const iterations = input.iterations ?? DEFAULT_STOCHASTIC_ITERATIONS;
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new InvalidCalculationInputError(
      `iterations must be a positive integer (got ${iterations})`
    );
  }
  return iterations;
};

export const createCalculationPipeline = (
  options: PipelineOptions = {}
): CalculationPipeline => {
  const stages = options.stages ?? referenceStages;
  const noise = options.noise ?? createUniformNoise();
  const random = options.random ?? Math.random;
  const discountRate = options.discountRate ?? DEFAULT_DISCOUNT_RATE;

  const runDeterministic = async (
    input: CalculationInput,
    { onProgress, signal }: PipelineRunOptions = {}
  ): Promise<CalculationResult> => {
    const startedAt = performance.now();
    const report = async (percentage: number, message: string) => {
      throwIfAborted(signal);
      await onProgress?.(percentage, message);
    };

    await report(0, 'Starting engineering calculations');
    const engineering = stages.engineering(input.engineering);
    await report(25, 'Engineering calculations complete');

    const production = stages.production(input.production, engineering);
    await report(40, 'Production profile complete');

    const sales = stages.sales(input.sales, production);
    await report(55, 'Sales and revenue complete');

    const capex = stages.capex(input.capex, engineering);
    const opex = stages.opex(input.opex, production);
    await report(70, 'Capital and operating costs complete');

    const taxes = stages.taxes(input.tax, sales, capex, opex);
    await report(85, 'Tax calculations complete');

    const finalMetrics = calculateFinalMetrics({
      sales,
      capex,
      opex,
      taxes,
      discountRate,
    });
    if (!finalMetrics.irr_converged) {
      logger.warn('IRR did not converge; reporting last finite estimate', {
        caseId: input.caseId,
        irr: finalMetrics.irr,
      });
    }
    await report(100, 'Calculation complete');

    return {
      fingerprint: generateFingerprint(input),
      engineeringResults: engineering,
      productionResults: production,
      salesResults: sales,
      capexResults: capex,
      opexResults: opex,
      taxResults: taxes,
      finalMetrics,
      distributions: null,
      iterationsCompleted: 1,
      executionTimeSeconds: elapsedSeconds(startedAt),
    };
  };

  // 1 回分の評価。中間結果は捨てて指標だけ返す。
  const evaluatePass = (input: CalculationInput): FinalMetrics => {
    const engineering = stages.engineering(input.engineering);
    const production = stages.production(input.production, engineering);
    const sales = stages.sales(input.sales, production);
    const capex = stages.capex(input.capex, engineering);
    const opex = stages.opex(input.opex, production);
    const taxes = stages.taxes(input.tax, sales, capex, opex);
    return calculateFinalMetrics({ sales, capex, opex, taxes, discountRate });
  };

  const runStochastic = async (
    input: CalculationInput,
    { onProgress, signal }: PipelineRunOptions = {}
  ): Promise<CalculationResult> => {
    const startedAt = performance.now();
    const iterations = resolveIterations(input);
    const interval = Math.max(1, Math.floor(iterations / PROGRESS_STEPS));
    const samples: Record<MetricKey, number[]> = {
      npv: [],
      irr: [],
      pi: [],
      payback_period: [],
    };
    let nonConverged = 0;

    for (let i = 1; i <= iterations; i++) {
      throwIfAborted(signal);
      const metrics = evaluatePass(perturbInput(input, noise, random));
      for (const key of METRIC_KEYS) {
        samples[key].push(metrics[key]);
      }
      if (!metrics.irr_converged) nonConverged += 1;

      if (i % interval === 0 || i === iterations) {
        await yieldToEventLoop();
        throwIfAborted(signal);
        await onProgress?.(
          Math.floor((i * 100) / iterations),
          `Completed iterations: ${i}/${iterations}`
        );
      }
    }

    if (nonConverged > 0) {
      logger.warn('IRR did not converge in some iterations', {
        caseId: input.caseId,
        nonConverged,
        iterations,
      });
    }

    const distributions: MetricDistributions = {
      npv: summarizeDistribution(samples.npv),
      irr: summarizeDistribution(samples.irr),
      pi: summarizeDistribution(samples.pi),
      payback_period: summarizeDistribution(samples.payback_period),
    };

    return {
      fingerprint: generateFingerprint(input),
      ...emptyStageResults(),
      finalMetrics: {
        npv: distributions.npv.mean,
        irr: distributions.irr.mean,
        pi: distributions.pi.mean,
        payback_period: distributions.payback_period.mean,
        discount_rate: discountRate,
        irr_converged: nonConverged === 0,
      },
      distributions,
      iterationsCompleted: iterations,
      executionTimeSeconds: elapsedSeconds(startedAt),
    };
  };

  return {
    runDeterministic,
    runStochastic,
    run(input, runOptions) {
      return input.mode === 'stochastic'
        ? runStochastic(input, runOptions)
        : runDeterministic(input, runOptions);
    },
  };
};
