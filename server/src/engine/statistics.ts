import type { DistributionStats } from '@/model/calculation';
import { ComputationError } from '@/model/errors';

// 最近傍順位（補間なし）。偶数件でも中央2点の平均は取らない。
const atRank = (sorted: number[], percent: number): number =>
  sorted[Math.floor((sorted.length * percent) / 100)];

export const summarizeDistribution = (samples: number[]): DistributionStats => {
  if (samples.length === 0) {
    throw new ComputationError('final_metrics', 'cannot summarize an empty sample');
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const count = sorted.length;
  const min = sorted[0];
  const max = sorted[count - 1];
  // 丸め誤差で [min, max] の外に出さない
  const mean = Math.min(
    max,
    Math.max(min, sorted.reduce((acc, value) => acc + value, 0) / count)
  );
  const variance =
    sorted.reduce((acc, value) => acc + (value - mean) ** 2, 0) / count;

  return {
    mean,
    median: sorted[Math.floor(count / 2)],
    variance,
    std_dev: Math.sqrt(variance),
    min,
    max,
    p10: atRank(sorted, 10),
    p50: atRank(sorted, 50),
    p90: atRank(sorted, 90),
    distribution: sorted,
  };
};
