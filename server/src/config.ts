// src/config.ts
//
// 目的:
// - 計算エンジンの設定値を環境変数（.env）から読み込み、型付きで返す。
// - 数値として解釈できない値は既定値に戻し、warn ログを出す。
import dotenv from 'dotenv';
import { logger } from '@/logger';

dotenv.config();

export interface CalculationSettings {
  sync: {
    cacheTtlSeconds: number;
  };
  async: {
    queueName: string;
    timeoutSeconds: number;
    retryAttempts: number;
    retryBackoffSeconds: number;
    visibilityTimeoutSeconds: number;
  };
  iterations: {
    min: number;
    max: number;
    default: number;
  };
  cleanup: {
    gracePeriodDays: number;
    deleteAfterDays: number;
  };
  progress: {
    persistIntervalPercent: number;
    cacheTtlSeconds: number;
  };
  broadcastingEnabled: boolean;
  discountRate: number;
  noise: {
    distribution: NoiseDistribution;
    spread: number;
    seed: number | null;
  };
  worker: {
    concurrency: number;
    pollIntervalMs: number;
  };
}

export type NoiseDistribution = 'uniform' | 'triangular';

type Env = Record<string, string | undefined>;

const readNumber = (
  env: Env,
  key: string,
  fallback: number,
  { integer = true, min = integer ? 1 : 0 }: { integer?: boolean; min?: number } = {}
): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  const valid =
    Number.isFinite(value) && value >= min && (!integer || Number.isInteger(value));
  if (!valid) {
    logger.warn(`Invalid ${key}; using default`, { value: raw, default: fallback });
    return fallback;
  }
  return value;
};

const readBoolean = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;
  logger.warn(`Invalid ${key}; using default`, { value: raw, default: fallback });
  return fallback;
};

// 不正なシードは未指定として扱う（Math.random を使う）
const readSeed = (env: Env): number | null => {
  const raw = env.CALC_NOISE_SEED?.trim();
  if (!raw) return null;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    logger.warn('Invalid CALC_NOISE_SEED; using unseeded noise', { value: raw });
    return null;
  }
  return value;
};

export const loadCalculationSettings = (
  env: Env = process.env
): CalculationSettings => {
  const timeoutSeconds = readNumber(env, 'CALC_ASYNC_TIMEOUT', 3600);
  const distribution = env.CALC_NOISE_DISTRIBUTION?.trim().toLowerCase() || 'uniform';
  if (distribution !== 'uniform' && distribution !== 'triangular') {
    logger.warn('Invalid CALC_NOISE_DISTRIBUTION; using default', {
      value: distribution,
      default: 'uniform',
    });
  }

  const settings: CalculationSettings = {
    sync: {
      cacheTtlSeconds: readNumber(env, 'CALC_SYNC_CACHE_TTL', 3600),
    },
    async: {
      queueName: env.CALC_QUEUE_NAME?.trim() || 'calculations',
      timeoutSeconds,
      retryAttempts: readNumber(env, 'CALC_RETRY_ATTEMPTS', 3),
      retryBackoffSeconds: readNumber(env, 'CALC_RETRY_BACKOFF', 60, { min: 0 }),
      visibilityTimeoutSeconds: readNumber(
        env,
        'CALC_QUEUE_VISIBILITY_TIMEOUT',
        timeoutSeconds + 300
      ),
    },
    iterations: {
      min: readNumber(env, 'CALC_MIN_ITERATIONS', 100),
      max: readNumber(env, 'CALC_MAX_ITERATIONS', 10000),
      default: readNumber(env, 'CALC_DEFAULT_ITERATIONS', 1000),
    },
    cleanup: {
      gracePeriodDays: readNumber(env, 'CALC_GRACE_PERIOD_DAYS', 7, { min: 0 }),
      deleteAfterDays: readNumber(env, 'CALC_DELETE_AFTER_DAYS', 30),
    },
    progress: {
      persistIntervalPercent: readNumber(env, 'CALC_PROGRESS_INTERVAL', 5),
      cacheTtlSeconds: readNumber(env, 'CALC_PROGRESS_TTL', 300),
    },
    broadcastingEnabled: readBoolean(env, 'CALC_BROADCASTING_ENABLED', true),
    discountRate: readNumber(env, 'CALC_DISCOUNT_RATE', 0.1, {
      integer: false,
      min: 0,
    }),
    noise: {
      distribution: distribution === 'triangular' ? 'triangular' : 'uniform',
      spread: readNumber(env, 'CALC_NOISE_SPREAD', 0.1, { integer: false, min: 0 }),
      seed: readSeed(env),
    },
    worker: {
      concurrency: readNumber(env, 'CALC_WORKER_CONCURRENCY', 1),
      pollIntervalMs: readNumber(env, 'CALC_WORKER_POLL_INTERVAL_MS', 1000),
    },
  };

  // 可視性タイムアウトがジョブのタイムアウトより短いと二重配信される
  if (settings.async.visibilityTimeoutSeconds < settings.async.timeoutSeconds) {
    logger.warn('CALC_QUEUE_VISIBILITY_TIMEOUT is shorter than CALC_ASYNC_TIMEOUT', {
      visibilityTimeoutSeconds: settings.async.visibilityTimeoutSeconds,
      timeoutSeconds: settings.async.timeoutSeconds,
    });
  }
  if (settings.iterations.min > settings.iterations.max) {
    logger.warn('CALC_MIN_ITERATIONS exceeds CALC_MAX_ITERATIONS; using defaults');
    settings.iterations.min = 100;
    settings.iterations.max = 10000;
  }

  return settings;
};
