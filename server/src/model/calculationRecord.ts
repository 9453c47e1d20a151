import type {
  CalculationInput,
  CalculationMode,
  FinalMetrics,
  MetricDistributions,
  StageResultMap,
} from '@/model/calculation';
import { InvalidStatusTransitionError } from '@/model/errors';

export type CalculationStatus =
  | 'pending'
  | 'processing'
  | 'completed'
  | 'failed'
  | 'permanently_failed';

// to → 遷移元として許可されるステータス
// failed → processing はリトライ時のみ発生する
const ALLOWED_PREVIOUS: Record<CalculationStatus, CalculationStatus[]> = {
  pending: [],
  processing: ['pending', 'failed'],
  completed: ['processing'],
  failed: ['pending', 'processing'],
  permanently_failed: ['pending', 'processing', 'failed'],
};

export const allowedPreviousStatuses = (
  next: CalculationStatus
): readonly CalculationStatus[] => ALLOWED_PREVIOUS[next];

export const canTransition = (
  from: CalculationStatus,
  to: CalculationStatus
): boolean => ALLOWED_PREVIOUS[to].includes(from);

export const assertStatusTransition = (
  from: CalculationStatus,
  to: CalculationStatus
): void => {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
};

export const isTerminalStatus = (status: CalculationStatus): boolean =>
  status === 'completed' || status === 'permanently_failed';

export interface CalculationRecord {
  id: string;
  caseId: number;
  fingerprint: string;
  mode: CalculationMode;
  status: CalculationStatus;
  inputParams: CalculationInput | null;
  progressPercentage: number;
  progressMessage: string | null;
  iterationsTotal: number | null;
  iterationsCompleted: number | null;
  startedAt: Date | null;
  completedAt: Date | null;
  failedAt: Date | null;
  cancelledAt: Date | null;
  executionTimeSeconds: number | null;
  engineeringResults: StageResultMap | null;
  productionResults: StageResultMap | null;
  salesResults: StageResultMap | null;
  capexResults: StageResultMap | null;
  opexResults: StageResultMap | null;
  taxResults: StageResultMap | null;
  finalMetrics: FinalMetrics | null;
  distributions: MetricDistributions | null;
  errorMessage: string | null;
  errorTrace: string | null;
  detachAt: Date | null;
  deleteAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewCalculationRecord = Pick<
  CalculationRecord,
  | 'caseId'
  | 'fingerprint'
  | 'mode'
  | 'inputParams'
  | 'iterationsTotal'
>;

export type CalculationRecordUpdate = Partial<
  Omit<CalculationRecord, 'id' | 'caseId' | 'mode' | 'createdAt' | 'updatedAt'>
>;

export interface CaseRecord {
  id: number;
  currentCalculationId: string | null;
  currentCalculationFingerprint: string | null;
}

export interface CaseCalculationStats {
  total: number;
  active: number;
  completed: number;
  scheduled_for_deletion: number;
}
