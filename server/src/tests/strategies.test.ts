import { jest } from '@jest/globals';
import type { CalculationResult, CalculationWorkUnit } from '../model/calculation';
import { InvalidCalculationInputError } from '../model/errors';
import { createCalculationPipeline } from '../engine/pipeline';
import { createInMemoryCacheStore } from '../service/cacheStore';
import { createInMemoryCalculationStore } from '../service/calculationStore';
import { generateFingerprint } from '../service/fingerprint';
import {
  createInteractiveStrategy,
  syncCacheKey,
} from '../service/strategies/interactiveStrategy';
import {
  calculationTags,
  createStochasticStrategy,
} from '../service/strategies/stochasticStrategy';
import { createInMemoryWorkQueue } from '../service/workQueue';
import { buildInput, buildStochasticInput } from './helpers/calculationInputs';

describe('対話モード戦略', () => {
  test('キャッシュミス時は計算してキャッシュに保存する', async () => {
    const cache = createInMemoryCacheStore<CalculationResult>();
    const pipeline = createCalculationPipeline();
    const runDeterministic = jest.spyOn(pipeline, 'runDeterministic');
    const strategy = createInteractiveStrategy({ pipeline, cache, cacheTtlSeconds: 120 });
    const input = buildInput();

    const first = await strategy.execute(input);
    expect(first).toMatchObject({ kind: 'completed', fromCache: false });
    expect(cache.entries.has(syncCacheKey(generateFingerprint(input)))).toBe(true);

    const second = await strategy.execute(input);
    expect(second).toMatchObject({ kind: 'completed', fromCache: true });
    expect(runDeterministic).toHaveBeenCalledTimes(1);
    if (first.kind === 'completed' && second.kind === 'completed') {
      expect(second.result.finalMetrics).toEqual(first.result.finalMetrics);
    }
  });

  test('キャッシュキーは calc:sync:{fingerprint}', () => {
    expect(syncCacheKey('abc')).toBe('calc:sync:abc');
  });

  test('invalidateCache で再計算される', async () => {
    const cache = createInMemoryCacheStore<CalculationResult>();
    const strategy = createInteractiveStrategy({
      pipeline: createCalculationPipeline(),
      cache,
    });
    const input = buildInput();
    await strategy.execute(input);
    await strategy.invalidateCache(input);
    expect(cache.entries.size).toBe(0);
    expect(await strategy.execute(input)).toMatchObject({ fromCache: false });
  });

  test('キャッシュの障害はそのまま呼び出し元へ返す', async () => {
    const cache = createInMemoryCacheStore<CalculationResult>();
    jest.spyOn(cache, 'get').mockRejectedValue(new Error('cache down'));
    const strategy = createInteractiveStrategy({
      pipeline: createCalculationPipeline(),
      cache,
    });
    await expect(strategy.execute(buildInput())).rejects.toThrow('cache down');
  });

  test('永続化せずキャッシュする', () => {
    const strategy = createInteractiveStrategy({
      pipeline: createCalculationPipeline(),
      cache: createInMemoryCacheStore<CalculationResult>(),
    });
    expect(strategy.shouldPersist()).toBe(false);
    expect(strategy.shouldCache()).toBe(true);
    expect(strategy.name()).toBe('interactive');
  });
});

describe('確率モード戦略', () => {
  const setup = () => {
    const store = createInMemoryCalculationStore();
    const queue = createInMemoryWorkQueue<CalculationWorkUnit>();
    const strategy = createStochasticStrategy({
      store,
      queue,
      settings: { minIterations: 100, maxIterations: 1000, maxAttempts: 4 },
    });
    return { store, queue, strategy };
  };

  test('pending のレコードを作成してキューに積む', async () => {
    const { store, queue, strategy } = setup();
    const input = buildStochasticInput({ iterations: 300 });

    const outcome = await strategy.execute(input);
    if (outcome.kind !== 'pending') throw new Error('pending を期待');
    expect(outcome.fingerprint).toBe(generateFingerprint(input));

    const record = store.calculations.get(outcome.calculationId);
    expect(record).toMatchObject({
      status: 'pending',
      mode: 'stochastic',
      iterationsTotal: 300,
      fingerprint: outcome.fingerprint,
    });
    expect(record?.inputParams?.iterations).toBe(300);

    const [job] = Array.from(queue.jobs.values());
    expect(job.maxAttempts).toBe(4);
    expect(job.payload).toEqual({
      calculationId: outcome.calculationId,
      input,
      tags: ['calculation', 'monte_carlo', 'case:1', `calc:${outcome.calculationId}`],
    });
  });

  test('反復数が未指定なら既定値で補う', async () => {
    const { store, strategy } = setup();
    const outcome = await strategy.execute(buildStochasticInput({ iterations: null }));
    if (outcome.kind !== 'pending') throw new Error('pending を期待');
    expect(store.calculations.get(outcome.calculationId)?.iterationsTotal).toBe(1000);
  });

  test('範囲外の反復数は入力エラーでレコードを作らない', async () => {
    const { store, queue, strategy } = setup();
    await expect(
      strategy.execute(buildStochasticInput({ iterations: 99 }))
    ).rejects.toBeInstanceOf(InvalidCalculationInputError);
    await expect(
      strategy.execute(buildStochasticInput({ iterations: 1001 }))
    ).rejects.toThrow('iterations must be an integer between 100 and 1000 (got 1001)');
    expect(store.calculations.size).toBe(0);
    expect(queue.jobs.size).toBe(0);
  });

  test('永続化しキャッシュしない', () => {
    const { strategy } = setup();
    expect(strategy.shouldPersist()).toBe(true);
    expect(strategy.shouldCache()).toBe(false);
    expect(strategy.name()).toBe('stochastic');
  });

  test('タグ', () => {
    expect(calculationTags(3, 'x')).toEqual(['calculation', 'monte_carlo', 'case:3', 'calc:x']);
  });
});
