import type { KeyMetrics } from '@/model/calculation';

export interface ProgressPayload {
  calculation_id: string;
  case_id: number;
  percentage: number;
  message: string;
  timestamp: string;
}

export interface CompletedPayload {
  calculation_id: string;
  results: KeyMetrics;
  timestamp: string;
}

export interface FailedPayload {
  calculation_id: string;
  error: string;
  timestamp: string;
}

export type CalculationNotification =
  | { event: 'calculation.progress'; payload: ProgressPayload }
  | { event: 'calculation.completed'; payload: CompletedPayload }
  | { event: 'calculation.failed'; payload: FailedPayload };

export type CalculationEventName = CalculationNotification['event'];

export const caseTopic = (caseId: number): string =>
  `case.${caseId}.calculations`;
