// 対話モード: キャッシュ優先、ミス時は決定論モードを呼び出し元のフローで実行する。
// 永続化はしない。キャッシュの例外はそのまま呼び出し元へ返す（リトライしない）。
import type { CalculationInput, CalculationResult } from '@/model/calculation';
import type { CalculationPipeline } from '@/engine/pipeline';
import { logger } from '@/logger';
import type { CacheStore } from '../cacheStore';
import { generateFingerprint } from '../fingerprint';
import type { CalculationStrategy } from './types';

export const DEFAULT_SYNC_CACHE_TTL_SECONDS = 3600;

export const syncCacheKey = (fingerprint: string): string =>
  `calc:sync:${fingerprint}`;

interface InteractiveStrategyDeps {
  pipeline: CalculationPipeline;
  cache: CacheStore<CalculationResult>;
  cacheTtlSeconds?: number;
}

export const createInteractiveStrategy = ({
  pipeline,
  cache,
  cacheTtlSeconds = DEFAULT_SYNC_CACHE_TTL_SECONDS,
}: InteractiveStrategyDeps): CalculationStrategy & {
  invalidateCache(input: CalculationInput): Promise<void>;
} => ({
  async execute(input, onProgress) {
    const cacheKey = syncCacheKey(generateFingerprint(input));
    const cached = await cache.get(cacheKey);
    if (cached) {
      logger.debug('Calculation served from cache', {
        cacheKey,
        caseId: input.caseId,
      });
      return { kind: 'completed', result: cached, fromCache: true };
    }

    const result = await pipeline.runDeterministic(input, { onProgress });
    await cache.set(cacheKey, result, cacheTtlSeconds);
    logger.log('Calculation completed and cached', {
      cacheKey,
      caseId: input.caseId,
      executionTimeSeconds: result.executionTimeSeconds,
    });

    return { kind: 'completed', result, fromCache: false };
  },

  async invalidateCache(input) {
    const cacheKey = syncCacheKey(generateFingerprint(input));
    await cache.delete(cacheKey);
    logger.log('Calculation cache invalidated', { cacheKey });
  },

  shouldPersist: () => false,
  shouldCache: () => true,
  name: () => 'interactive',
});
