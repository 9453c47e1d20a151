// src/model/calculation.ts
//
// 目的:
// - 計算リクエスト（入力）と計算結果の型を集中管理する。
// 前後関係:
// - 入力は utils/canonicalizer.ts → service/fingerprint.ts でフィンガープリント化され、
//   engine/pipeline.ts で評価される。結果はキャッシュ（対話モード）か
//   calculations テーブル（確率モード）に保存される。
export type CalculationMode = 'deterministic' | 'stochastic';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | ParameterGroup;

export interface ParameterGroup {
  [key: string]: ParameterValue;
}

export const PARAMETER_GROUPS = [
  'engineering',
  'production',
  'sales',
  'capex',
  'opex',
  'tax',
] as const;

export type ParameterGroupName = (typeof PARAMETER_GROUPS)[number];

// 税パラメータは確率モードでも固定
export const STOCHASTIC_GROUPS: readonly ParameterGroupName[] = [
  'engineering',
  'production',
  'sales',
  'capex',
  'opex',
];

export type CalculationParameters = Record<ParameterGroupName, ParameterGroup>;

export interface CalculationInput extends CalculationParameters {
  caseId: number;
  mode: CalculationMode;
  iterations: number | null;
  // フィンガープリントには含めない
  metadata?: Record<string, JsonValue> | null;
}

export const METRIC_KEYS = ['npv', 'irr', 'pi', 'payback_period'] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

export type KeyMetrics = Record<MetricKey, number>;

export type FinalMetrics = KeyMetrics & {
  discount_rate: number;
  irr_converged: boolean;
};

export type DistributionStats = {
  mean: number;
  median: number;
  variance: number;
  std_dev: number;
  min: number;
  max: number;
  p10: number;
  p50: number;
  p90: number;
  distribution: number[];
};

export type MetricDistributions = Record<MetricKey, DistributionStats>;

export type StageResultMap = { [key: string]: JsonValue };

export interface StageResults {
  engineeringResults: StageResultMap;
  productionResults: StageResultMap;
  salesResults: StageResultMap;
  capexResults: StageResultMap;
  opexResults: StageResultMap;
  taxResults: StageResultMap;
}

export interface CalculationResult extends StageResults {
  fingerprint: string;
  finalMetrics: FinalMetrics;
  distributions: MetricDistributions | null;
  iterationsCompleted: number;
  executionTimeSeconds: number;
}

export type ProgressSink = (
  percentage: number,
  message: string
) => void | Promise<void>;

export const emptyStageResults = (): StageResults => ({
  engineeringResults: {},
  productionResults: {},
  salesResults: {},
  capexResults: {},
  opexResults: {},
  taxResults: {},
});

export const pickKeyMetrics = (metrics: FinalMetrics): KeyMetrics => ({
  npv: metrics.npv,
  irr: metrics.irr,
  pi: metrics.pi,
  payback_period: metrics.payback_period,
});

// キューに載せる確率モードの作業単位
export interface CalculationWorkUnit {
  calculationId: string;
  input: CalculationInput;
  tags: string[];
}
