import {
  generateFingerprint,
  generateShortFingerprint,
  inputsMatch,
  isValidFingerprint,
  toHashable,
} from '../service/fingerprint';
import { buildInput } from './helpers/calculationInputs';

describe('フィンガープリント', () => {
  test('同じ入力からは同じ値が得られる', () => {
    expect(generateFingerprint(buildInput())).toBe(generateFingerprint(buildInput()));
    expect(isValidFingerprint(generateFingerprint(buildInput()))).toBe(true);
  });

  test('パラメータのキー順は結果に影響しない', () => {
    const reordered = buildInput({
      sales: { oil_price: 70 },
      capex: { facilities_cost: 10_000_000, cost_per_well: 5_000_000 },
    });
    expect(generateFingerprint(reordered)).toBe(generateFingerprint(buildInput()));
    expect(inputsMatch(reordered, buildInput())).toBe(true);
  });

  test('パラメータ・モード・反復数・ケースが変われば値も変わる', () => {
    const base = generateFingerprint(buildInput());
    expect(generateFingerprint(buildInput({ sales: { oil_price: 71 } }))).not.toBe(base);
    expect(generateFingerprint(buildInput({ mode: 'stochastic' }))).not.toBe(base);
    expect(generateFingerprint(buildInput({ iterations: 2 }))).not.toBe(base);
    expect(generateFingerprint(buildInput({ caseId: 2 }))).not.toBe(base);
  });

  test('metadata は対象外', () => {
    const withMetadata = buildInput({ metadata: { requestedBy: 'analyst' } });
    expect(generateFingerprint(withMetadata)).toBe(generateFingerprint(buildInput()));
    expect(toHashable(withMetadata)).not.toHaveProperty('metadata');
  });

  test('短縮形は先頭 16 文字', () => {
    const input = buildInput();
    expect(generateShortFingerprint(input)).toBe(generateFingerprint(input).slice(0, 16));
  });

  test('形式チェック', () => {
    expect(isValidFingerprint('a'.repeat(64))).toBe(true);
    expect(isValidFingerprint('A'.repeat(64))).toBe(false);
    expect(isValidFingerprint('a'.repeat(63))).toBe(false);
  });
});
