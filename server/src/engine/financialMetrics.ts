// src/engine/financialMetrics.ts
//
// 目的:
// - キャッシュフロー列から NPV / IRR / PI / 回収期間を算出する。
// 指標ごとのエラー方針:
// - npv: 有限でなければ ComputationError
// - irr: 収束しなければ最後の有限な推定値を返し irr_converged=false を記録
//   （warn ログは engine/pipeline.ts が出す）
// - pi: total_capex <= 0 なら ComputationError
// - payback_period: 回収できなければ事業年数（horizon）
import type { FinalMetrics } from '@/model/calculation';
import { ComputationError } from '@/model/errors';
import type { CapexOutput, OpexOutput, SalesOutput, TaxOutput } from './stages';

export const DEFAULT_DISCOUNT_RATE = 0.1;

const IRR_INITIAL_GUESS = 0.1;
const IRR_MAX_ITERATIONS = 100;
const IRR_TOLERANCE = 1e-4;
const IRR_MIN_DERIVATIVE = 1e-12;

// index 0 = 初期投資（-total_capex）、index t = t 年目
export const buildCashFlows = (
  totalCapex: number,
  revenue: number[],
  opex: number[],
  tax: number[]
): number[] => [
  -totalCapex,
  ...revenue.map(
    (value, index) => value - (opex[index] ?? 0) - (tax[index] ?? 0)
  ),
];

export const calculateNpv = (cashFlows: number[], rate: number): number =>
  cashFlows.reduce(
    (acc, cashFlow, year) => acc + cashFlow / Math.pow(1 + rate, year),
    0
  );

export interface IrrSolution {
  rate: number;
  converged: boolean;
  iterations: number;
}

export interface IrrOptions {
  initialGuess?: number;
  maxIterations?: number;
  tolerance?: number;
}

// Newton-Raphson。二分法へのフォールバックはしない。
export const solveIrr = (
  cashFlows: number[],
  options: IrrOptions = {}
): IrrSolution => {
  const maxIterations = options.maxIterations ?? IRR_MAX_ITERATIONS;
  const tolerance = options.tolerance ?? IRR_TOLERANCE;
  let guess = options.initialGuess ?? IRR_INITIAL_GUESS;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    let npv = 0;
    let derivative = 0;
    cashFlows.forEach((cashFlow, year) => {
      npv += cashFlow / Math.pow(1 + guess, year);
      derivative -= (year * cashFlow) / Math.pow(1 + guess, year + 1);
    });

    if (
      !Number.isFinite(npv) ||
      !Number.isFinite(derivative) ||
      Math.abs(derivative) < IRR_MIN_DERIVATIVE
    ) {
      return { rate: guess, converged: false, iterations: iteration };
    }

    const next = guess - npv / derivative;
    if (!Number.isFinite(next)) {
      return { rate: guess, converged: false, iterations: iteration };
    }
    if (Math.abs(next - guess) < tolerance) {
      return { rate: next, converged: true, iterations: iteration };
    }
    guess = next;
  }

  return { rate: guess, converged: false, iterations: maxIterations };
};

export const calculateProfitabilityIndex = (
  npv: number,
  totalCapex: number
): number => {
  if (!(totalCapex > 0)) {
    throw new ComputationError(
      'final_metrics',
      `profitability index is undefined for total_capex=${totalCapex}`,
      'pi'
    );
  }
  return (npv + totalCapex) / totalCapex;
};

// 累積（初期投資込み）が 0 以上になる最小の年 t >= 1。届かなければ horizon。
export const calculatePaybackPeriod = (cashFlows: number[]): number => {
  const horizon = Math.max(1, cashFlows.length - 1);
  let cumulative = cashFlows[0] ?? 0;
  for (let year = 1; year < cashFlows.length; year++) {
    cumulative += cashFlows[year];
    if (cumulative >= 0) return year;
  }
  return horizon;
};

export interface FinalMetricsInput {
  sales: SalesOutput;
  capex: CapexOutput;
  opex: OpexOutput;
  taxes: TaxOutput;
  discountRate?: number;
}

export const calculateFinalMetrics = ({
  sales,
  capex,
  opex,
  taxes,
  discountRate = DEFAULT_DISCOUNT_RATE,
}: FinalMetricsInput): FinalMetrics => {
  const cashFlows = buildCashFlows(
    capex.total_capex,
    sales.revenue_profile,
    opex.opex_profile,
    taxes.tax_profile
  );

  const npv = calculateNpv(cashFlows, discountRate);
  if (!Number.isFinite(npv)) {
    throw new ComputationError('final_metrics', `NPV is not finite (${npv})`, 'npv');
  }

  const irr = solveIrr(cashFlows);

  return {
    npv,
    irr: irr.rate,
    pi: calculateProfitabilityIndex(npv, capex.total_capex),
    payback_period: calculatePaybackPeriod(cashFlows),
    discount_rate: discountRate,
    irr_converged: irr.converged,
  };
};
