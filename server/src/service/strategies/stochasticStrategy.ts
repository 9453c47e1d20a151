// 確率モード: pending のレコードを作成して作業単位をキューに積み、すぐに戻る。
// キャッシュには触れない。
import type { CalculationWorkUnit } from '@/model/calculation';
import { InvalidCalculationInputError } from '@/model/errors';
import { logger } from '@/logger';
import type { CalculationStore } from '../calculationStore';
import { generateFingerprint } from '../fingerprint';
import type { WorkQueue } from '../workQueue';
import type { CalculationStrategy } from './types';

export interface StochasticStrategySettings {
  minIterations: number;
  maxIterations: number;
  defaultIterations: number;
  maxAttempts: number;
}

export const DEFAULT_STOCHASTIC_SETTINGS: StochasticStrategySettings = {
  minIterations: 100,
  maxIterations: 10000,
  defaultIterations: 1000,
  maxAttempts: 3,
};

interface StochasticStrategyDeps {
  store: CalculationStore;
  queue: WorkQueue<CalculationWorkUnit>;
  settings?: Partial<StochasticStrategySettings>;
}

export const calculationTags = (caseId: number, calculationId: string): string[] => [
  'calculation',
  'monte_carlo',
  `case:${caseId}`,
  `calc:${calculationId}`,
];

export const createStochasticStrategy = ({
  store,
  queue,
  settings,
}: StochasticStrategyDeps): CalculationStrategy => {
  const resolved = { ...DEFAULT_STOCHASTIC_SETTINGS, ...settings };

  return {
    async execute(rawInput) {
      const iterations = rawInput.iterations ?? resolved.defaultIterations;
      if (
        !Number.isInteger(iterations) ||
        iterations < resolved.minIterations ||
        iterations > resolved.maxIterations
      ) {
        throw new InvalidCalculationInputError(
          `iterations must be an integer between ${resolved.minIterations} and ${resolved.maxIterations} (got ${iterations})`
        );
      }

      const input = { ...rawInput, iterations };
      const fingerprint = generateFingerprint(input);
      const record = await store.createCalculation({
        caseId: input.caseId,
        fingerprint,
        mode: 'stochastic',
        inputParams: input,
        iterationsTotal: iterations,
      });

      const tags = calculationTags(input.caseId, record.id);
      await queue.enqueue(
        { calculationId: record.id, input, tags },
        { maxAttempts: resolved.maxAttempts }
      );

      logger.log('Calculation job dispatched', {
        calculationId: record.id,
        caseId: input.caseId,
        queue: queue.name,
        iterations,
      });

      return { kind: 'pending', calculationId: record.id, fingerprint };
    },

    shouldPersist: () => true,
    shouldCache: () => false,
    name: () => 'stochastic',
  };
};
