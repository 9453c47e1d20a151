import { jest } from '@jest/globals';
import { loadCalculationSettings } from '../config';

describe('計算設定の読み込み', () => {
  test('未設定なら既定値', () => {
    const settings = loadCalculationSettings({});
    expect(settings).toEqual({
      sync: { cacheTtlSeconds: 3600 },
      async: {
        queueName: 'calculations',
        timeoutSeconds: 3600,
        retryAttempts: 3,
        retryBackoffSeconds: 60,
        visibilityTimeoutSeconds: 3900,
      },
      iterations: { min: 100, max: 10000, default: 1000 },
      cleanup: { gracePeriodDays: 7, deleteAfterDays: 30 },
      progress: { persistIntervalPercent: 5, cacheTtlSeconds: 300 },
      broadcastingEnabled: true,
      discountRate: 0.1,
      noise: { distribution: 'uniform', spread: 0.1, seed: null },
      worker: { concurrency: 1, pollIntervalMs: 1000 },
    });
  });

  test('環境変数で上書きできる', () => {
    const settings = loadCalculationSettings({
      CALC_ASYNC_TIMEOUT: '600',
      CALC_RETRY_ATTEMPTS: '5',
      CALC_QUEUE_NAME: 'monte-carlo',
      CALC_BROADCASTING_ENABLED: 'false',
      CALC_DISCOUNT_RATE: '0.08',
      CALC_NOISE_SEED: '42',
      CALC_NOISE_DISTRIBUTION: 'Triangular',
      CALC_GRACE_PERIOD_DAYS: '0',
    });
    expect(settings.async).toMatchObject({
      queueName: 'monte-carlo',
      timeoutSeconds: 600,
      retryAttempts: 5,
      visibilityTimeoutSeconds: 900,
    });
    expect(settings.broadcastingEnabled).toBe(false);
    expect(settings.discountRate).toBe(0.08);
    expect(settings.noise).toEqual({ distribution: 'triangular', spread: 0.1, seed: 42 });
    expect(settings.cleanup.gracePeriodDays).toBe(0);
  });

  test('不正な値は既定値に戻して警告する', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const settings = loadCalculationSettings({
      CALC_RETRY_ATTEMPTS: 'three',
      CALC_MAX_ITERATIONS: '1.5',
      CALC_BROADCASTING_ENABLED: 'maybe',
      CALC_NOISE_DISTRIBUTION: 'gaussian',
    });
    expect(settings.async.retryAttempts).toBe(3);
    expect(settings.iterations.max).toBe(10000);
    expect(settings.broadcastingEnabled).toBe(true);
    expect(settings.noise.distribution).toBe('uniform');
    expect(warn).toHaveBeenCalledWith('Invalid CALC_RETRY_ATTEMPTS; using default', {
      value: 'three',
      default: 3,
    });
    warn.mockRestore();
  });

  test('数値でないシードは未指定として扱う', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadCalculationSettings({ CALC_NOISE_SEED: 'abc' }).noise.seed).toBeNull();
    expect(loadCalculationSettings({ CALC_NOISE_SEED: '-3' }).noise.seed).toBeNull();
    expect(loadCalculationSettings({ CALC_NOISE_SEED: '0' }).noise.seed).toBe(0);
    expect(warn).toHaveBeenCalledWith('Invalid CALC_NOISE_SEED; using unseeded noise', {
      value: 'abc',
    });
    warn.mockRestore();
  });

  test('最小反復数が最大を超えたら両方既定値', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const settings = loadCalculationSettings({
      CALC_MIN_ITERATIONS: '5000',
      CALC_MAX_ITERATIONS: '1000',
    });
    expect(settings.iterations).toMatchObject({ min: 100, max: 10000 });
    expect(warn).toHaveBeenCalledWith(
      'CALC_MIN_ITERATIONS exceeds CALC_MAX_ITERATIONS; using defaults'
    );
    warn.mockRestore();
  });

  test('可視性タイムアウトが短すぎると警告する', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    loadCalculationSettings({
      CALC_ASYNC_TIMEOUT: '600',
      CALC_QUEUE_VISIBILITY_TIMEOUT: '300',
    });
    expect(warn).toHaveBeenCalledWith(
      'CALC_QUEUE_VISIBILITY_TIMEOUT is shorter than CALC_ASYNC_TIMEOUT',
      { visibilityTimeoutSeconds: 300, timeoutSeconds: 600 }
    );
    warn.mockRestore();
  });
});
