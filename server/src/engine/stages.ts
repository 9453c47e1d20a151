// src/engine/stages.ts
//
// 目的:
// - パイプライン各ステージの入出力型と、参照実装（reference stages）を定義する。
// 前後関係:
// - engine/pipeline.ts が engineering → production → sales → capex/opex → taxes
//   の順に呼び出す。最終指標は engine/financialMetrics.ts が担当する。
// - プロファイル配列は index 0 が 1 年目。
// - 各ステージは新しいオブジェクトを返し、上流の出力を書き換えない。
import type { ParameterGroup } from '@/model/calculation';
import { ComputationError, InvalidCalculationInputError } from '@/model/errors';

export type EngineeringOutput = {
  reserves: number;
  well_count: number;
  productivity_index: number;
  decline_rate: number;
};

export type ProductionOutput = {
  project_lifetime: number;
  production_profile: number[];
  cumulative_production: number;
  peak_production: number;
};

export type SalesOutput = {
  revenue_profile: number[];
  total_revenue: number;
  average_annual_revenue: number;
};

export type CapexOutput = {
  drilling_capex: number;
  facilities_capex: number;
  total_capex: number;
};

export type OpexOutput = {
  opex_profile: number[];
  total_opex: number;
};

export type TaxOutput = {
  tax_profile: number[];
  total_tax: number;
};

export interface PipelineStages {
  engineering(params: ParameterGroup): EngineeringOutput;
  production(
    params: ParameterGroup,
    engineering: EngineeringOutput
  ): ProductionOutput;
  sales(params: ParameterGroup, production: ProductionOutput): SalesOutput;
  capex(params: ParameterGroup, engineering: EngineeringOutput): CapexOutput;
  opex(params: ParameterGroup, production: ProductionOutput): OpexOutput;
  taxes(
    params: ParameterGroup,
    sales: SalesOutput,
    capex: CapexOutput,
    opex: OpexOutput
  ): TaxOutput;
}

export const readNumber = (
  params: ParameterGroup,
  key: string,
  fallback: number,
  group: string
): number => {
  const value = params[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidCalculationInputError(
      `${group}.${key} must be a finite number`
    );
  }
  return value;
};

const sum = (values: number[]): number =>
  values.reduce((acc, value) => acc + value, 0);

export const referenceStages: PipelineStages = {
  engineering(params) {
    return {
      reserves: readNumber(params, 'initial_reserves', 0, 'engineering'),
      well_count: readNumber(params, 'well_count', 0, 'engineering'),
      productivity_index: readNumber(
        params,
        'productivity_index',
        1,
        'engineering'
      ),
      decline_rate: readNumber(params, 'decline_rate', 0.1, 'engineering'),
    };
  },

  production(params, engineering) {
    const lifetime = readNumber(params, 'project_lifetime', 20, 'production');
    // 摂動後の非整数は切り捨てて年数にする
    const years = Math.floor(lifetime);
    if (years < 1) {
      throw new ComputationError(
        'production',
        `project_lifetime must cover at least one year (got ${lifetime})`
      );
    }
    const initialProduction = engineering.reserves * 0.1;
    const profile = Array.from(
      { length: years },
      (_, index) => initialProduction * Math.exp(-engineering.decline_rate * index)
    );
    return {
      project_lifetime: years,
      production_profile: profile,
      cumulative_production: sum(profile),
      peak_production: Math.max(...profile),
    };
  },

  sales(params, production) {
    const price = readNumber(params, 'oil_price', 70, 'sales');
    const revenue = production.production_profile.map((volume) => volume * price);
    const total = sum(revenue);
    return {
      revenue_profile: revenue,
      total_revenue: total,
      average_annual_revenue: total / revenue.length,
    };
  },

  capex(params, engineering) {
    const costPerWell = readNumber(params, 'cost_per_well', 5_000_000, 'capex');
    const facilities = readNumber(params, 'facilities_cost', 10_000_000, 'capex');
    const drilling = engineering.well_count * costPerWell;
    return {
      drilling_capex: drilling,
      facilities_capex: facilities,
      total_capex: drilling + facilities,
    };
  },

  opex(params, production) {
    const fixed = readNumber(params, 'fixed_opex', 1_000_000, 'opex');
    const variableRate = readNumber(params, 'variable_opex_rate', 10, 'opex');
    const profile = production.production_profile.map(
      (volume) => fixed + volume * variableRate
    );
    return { opex_profile: profile, total_opex: sum(profile) };
  },

  taxes(params, sales, _capex, opex) {
    const taxRate = readNumber(params, 'tax_rate', 0.2, 'tax');
    const miningTaxRate = readNumber(params, 'mining_tax_rate', 0.1, 'tax');
    const profile = sales.revenue_profile.map((revenue, index) => {
      const profit = revenue - (opex.opex_profile[index] ?? 0);
      const incomeTax = Math.max(0, profit * taxRate);
      return incomeTax + revenue * miningTaxRate;
    });
    return { tax_profile: profile, total_tax: sum(profile) };
  },
};
