import type { CalculationResult } from '@/model/calculation';
import type {
  CalculationRecord,
  CalculationRecordUpdate,
} from '@/model/calculationRecord';

export const COMPLETED_MESSAGE = 'Calculation completed successfully';

// 完了時にまとめて書き込む項目
export const toCompletionUpdate = (
  result: CalculationResult,
  completedAt: Date
): CalculationRecordUpdate => ({
  status: 'completed',
  progressPercentage: 100,
  progressMessage: COMPLETED_MESSAGE,
  completedAt,
  iterationsCompleted: result.iterationsCompleted,
  executionTimeSeconds: result.executionTimeSeconds,
  engineeringResults: result.engineeringResults,
  productionResults: result.productionResults,
  salesResults: result.salesResults,
  capexResults: result.capexResults,
  opexResults: result.opexResults,
  taxResults: result.taxResults,
  finalMetrics: result.finalMetrics,
  distributions: result.distributions,
  errorMessage: null,
  errorTrace: null,
});

// 完了していないレコードは null
export const toCalculationResult = (
  record: CalculationRecord
): CalculationResult | null => {
  if (record.status !== 'completed' || !record.finalMetrics) return null;
  return {
    fingerprint: record.fingerprint,
    engineeringResults: record.engineeringResults ?? {},
    productionResults: record.productionResults ?? {},
    salesResults: record.salesResults ?? {},
    capexResults: record.capexResults ?? {},
    opexResults: record.opexResults ?? {},
    taxResults: record.taxResults ?? {},
    finalMetrics: record.finalMetrics,
    distributions: record.distributions,
    iterationsCompleted: record.iterationsCompleted ?? 0,
    executionTimeSeconds: record.executionTimeSeconds ?? 0,
  };
};
