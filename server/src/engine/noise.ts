// src/engine/noise.ts
//
// 目的:
// - 確率モード（モンテカルロ）でパラメータに掛ける乗数ノイズを生成する。
// - 乱数源は注入する。既定は Math.random、再現が必要なら createSeededRandom(seed)。
import {
  STOCHASTIC_GROUPS,
  type CalculationInput,
  type ParameterGroup,
  type ParameterValue,
} from '@/model/calculation';

// [0, 1) の一様乱数
export type RandomSource = () => number;

export interface NoisePolicy {
  readonly name: string;
  // 1.0 を中心とした対称な乗数を返す
  sample(random: RandomSource): number;
}

export const createUniformNoise = (spread = 0.1): NoisePolicy => ({
  name: `uniform(±${spread})`,
  sample: (random) => 1 + (2 * random() - 1) * spread,
});

export const createTriangularNoise = (spread = 0.1): NoisePolicy => ({
  name: `triangular(±${spread})`,
  sample: (random) => {
    const u = random();
    return u < 0.5
      ? 1 - spread + spread * Math.sqrt(2 * u)
      : 1 + spread - spread * Math.sqrt(2 * (1 - u));
  },
});

// mulberry32
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

const perturbValue = (
  value: ParameterValue,
  policy: NoisePolicy,
  random: RandomSource
): ParameterValue => {
  if (typeof value === 'number') return value * policy.sample(random);
  if (Array.isArray(value)) {
    return value.map((item) => perturbValue(item, policy, random));
  }
  if (value !== null && typeof value === 'object') {
    return perturbParameters(value, policy, random);
  }
  return value;
};

// 数値の葉すべてに独立した乗数を掛けた新しいグループを返す
export const perturbParameters = (
  params: ParameterGroup,
  policy: NoisePolicy,
  random: RandomSource
): ParameterGroup => {
  const result: ParameterGroup = {};
  for (const [key, value] of Object.entries(params)) {
    result[key] = perturbValue(value, policy, random);
  }
  return result;
};

// tax は固定のまま
export const perturbInput = (
  input: CalculationInput,
  policy: NoisePolicy,
  random: RandomSource
): CalculationInput => {
  const next: CalculationInput = { ...input };
  for (const group of STOCHASTIC_GROUPS) {
    next[group] = perturbParameters(input[group], policy, random);
  }
  return next;
};
