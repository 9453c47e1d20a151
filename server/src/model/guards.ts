// src/model/guards.ts
//
// 目的:
// - DB(JSONB)やキュー、CLIのJSONファイルから読み出した unknown 値を
//   計算モデルの型へ絞り込む。形が合わなければ例外にする。
import {
  METRIC_KEYS,
  PARAMETER_GROUPS,
  type CalculationInput,
  type DistributionStats,
  type FinalMetrics,
  type JsonValue,
  type MetricDistributions,
  type ParameterGroup,
  type ParameterValue,
  type StageResultMap,
} from '@/model/calculation';
import { InvalidCalculationInputError } from '@/model/errors';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
};

const isParameterValue = (value: unknown): value is ParameterValue =>
  isJsonValue(value);

export const isParameterGroup = (value: unknown): value is ParameterGroup =>
  isRecord(value) && Object.values(value).every(isParameterValue);

const isJsonObject = (value: unknown): value is StageResultMap =>
  isRecord(value) && isJsonValue(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

export const parseCalculationInput = (value: unknown): CalculationInput => {
  if (!isRecord(value)) {
    throw new InvalidCalculationInputError('計算入力はオブジェクトで指定してください');
  }

  const caseId = value.caseId;
  if (typeof caseId !== 'number' || !Number.isInteger(caseId) || caseId <= 0) {
    throw new InvalidCalculationInputError('caseId は正の整数で指定してください');
  }

  const mode = value.mode;
  if (mode !== 'deterministic' && mode !== 'stochastic') {
    throw new InvalidCalculationInputError(
      `mode must be "deterministic" or "stochastic" (got ${String(mode)})`
    );
  }

  const iterations = value.iterations ?? null;
  if (iterations !== null && !isFiniteNumber(iterations)) {
    throw new InvalidCalculationInputError('iterations は数値で指定してください');
  }

  const groups: Partial<Record<(typeof PARAMETER_GROUPS)[number], ParameterGroup>> = {};
  for (const group of PARAMETER_GROUPS) {
    const raw = value[group] ?? {};
    if (!isParameterGroup(raw)) {
      throw new InvalidCalculationInputError(
        `${group} parameters must be a JSON object`
      );
    }
    groups[group] = raw;
  }

  const metadata = value.metadata ?? null;
  if (metadata !== null && !isJsonObject(metadata)) {
    throw new InvalidCalculationInputError('metadata must be a JSON object');
  }

  return {
    caseId,
    mode,
    iterations,
    engineering: groups.engineering ?? {},
    production: groups.production ?? {},
    sales: groups.sales ?? {},
    capex: groups.capex ?? {},
    opex: groups.opex ?? {},
    tax: groups.tax ?? {},
    metadata,
  };
};

export const parseStageResultMap = (value: unknown): StageResultMap | null =>
  isJsonObject(value) ? value : null;

export const parseFinalMetrics = (value: unknown): FinalMetrics | null => {
  if (!isRecord(value)) return null;
  const { npv, irr, pi, payback_period, discount_rate, irr_converged } = value;
  if (
    !isFiniteNumber(npv) ||
    !isFiniteNumber(irr) ||
    !isFiniteNumber(pi) ||
    !isFiniteNumber(payback_period)
  ) {
    return null;
  }
  return {
    npv,
    irr,
    pi,
    payback_period,
    discount_rate: isFiniteNumber(discount_rate) ? discount_rate : 0.1,
    irr_converged: irr_converged !== false,
  };
};

const parseDistributionStats = (raw: unknown): DistributionStats | null => {
  if (!isRecord(raw)) return null;
  const value = raw;
  const fields = ['mean', 'median', 'std_dev', 'min', 'max', 'p10', 'p50', 'p90'] as const;
  if (!fields.every((field) => isFiniteNumber(value[field]))) return null;
  const distribution = value.distribution;
  if (!Array.isArray(distribution) || !distribution.every(isFiniteNumber)) {
    return null;
  }
  const read = (field: (typeof fields)[number]): number => {
    const raw = value[field];
    return isFiniteNumber(raw) ? raw : 0;
  };
  const stdDev = read('std_dev');
  return {
    mean: read('mean'),
    median: read('median'),
    variance: isFiniteNumber(value.variance) ? value.variance : stdDev * stdDev,
    std_dev: stdDev,
    min: read('min'),
    max: read('max'),
    p10: read('p10'),
    p50: read('p50'),
    p90: read('p90'),
    distribution,
  };
};

export const parseDistributions = (
  raw: unknown
): MetricDistributions | null => {
  if (!isRecord(raw)) return null;
  const value = raw;
  const entries = METRIC_KEYS.map(
    (key) => [key, parseDistributionStats(value[key])] as const
  );
  const [npv, irr, pi, payback] = entries.map(([, stats]) => stats);
  if (!npv || !irr || !pi || !payback) return null;
  return { npv, irr, pi, payback_period: payback };
};
