import {
  createSeededRandom,
  createTriangularNoise,
  createUniformNoise,
  perturbInput,
  perturbParameters,
} from '../engine/noise';
import { buildInput } from './helpers/calculationInputs';

const constant = (value: number) => () => value;

describe('パラメータノイズ', () => {
  test('一様ノイズは 1 ± spread の乗数', () => {
    const noise = createUniformNoise(0.1);
    expect(noise.sample(constant(0))).toBeCloseTo(0.9, 12);
    expect(noise.sample(constant(0.5))).toBe(1);
    expect(noise.sample(constant(0.75))).toBeCloseTo(1.05, 12);
  });

  test('三角分布ノイズは中央で 1、端で 1 ± spread', () => {
    const noise = createTriangularNoise(0.2);
    expect(noise.sample(constant(0))).toBeCloseTo(0.8, 12);
    expect(noise.sample(constant(0.5))).toBeCloseTo(1, 12);
  });

  test('シード付き乱数は同じシードで同じ系列を返す', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = Array.from({ length: 5 }, () => a());
    const second = Array.from({ length: 5 }, () => b());
    expect(first).toEqual(second);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
    const c = createSeededRandom(43);
    expect(c()).not.toBe(first[0]);
  });

  test('数値の葉だけに乗数を掛ける', () => {
    const perturbed = perturbParameters(
      { a: 10, b: 'label', c: [1, 2], d: { e: 4 }, f: null, g: true },
      createUniformNoise(0.1),
      constant(0.75)
    );
    expect(perturbed.a).toBeCloseTo(10.5, 10);
    expect(perturbed.b).toBe('label');
    expect(perturbed.f).toBeNull();
    expect(perturbed.g).toBe(true);
    expect(perturbed.c).toEqual([expect.closeTo(1.05, 10), expect.closeTo(2.1, 10)]);
    expect(perturbed.d).toEqual({ e: expect.closeTo(4.2, 10) });
  });

  test('税パラメータとケース情報は変えず、元の入力も変更しない', () => {
    const input = buildInput();
    const perturbed = perturbInput(input, createUniformNoise(0.1), constant(0.75));
    expect(perturbed.tax).toEqual(input.tax);
    expect(perturbed.caseId).toBe(input.caseId);
    expect(perturbed.mode).toBe(input.mode);
    expect(perturbed.sales.oil_price).toBeCloseTo(73.5, 10);
    expect(input.sales.oil_price).toBe(70);
  });
});
