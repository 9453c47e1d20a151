import type { CalculationInput } from '@/model/calculation';
import { areEqual, generateHash } from '@/utils/canonicalizer';

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;
const SHORT_LENGTH = 16;

// ハッシュ対象の項目。metadata は含めない。
export const toHashable = (input: CalculationInput) => ({
  case_id: input.caseId,
  calculation_type: input.mode,
  engineer_params: input.engineering,
  production_params: input.production,
  sales_params: input.sales,
  capex_params: input.capex,
  opex_params: input.opex,
  tax_params: input.tax,
  iterations: input.iterations,
});

export const generateFingerprint = (input: CalculationInput): string =>
  generateHash(toHashable(input));

// 表示専用。衝突耐性はないので照合には使わない。
export const generateShortFingerprint = (input: CalculationInput): string =>
  generateFingerprint(input).slice(0, SHORT_LENGTH);

export const isValidFingerprint = (fingerprint: string): boolean =>
  FINGERPRINT_PATTERN.test(fingerprint);

export const inputsMatch = (a: CalculationInput, b: CalculationInput): boolean =>
  areEqual(toHashable(a), toHashable(b));
