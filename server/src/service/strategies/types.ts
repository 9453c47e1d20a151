import type {
  CalculationInput,
  CalculationResult,
  ProgressSink,
} from '@/model/calculation';

export type StrategyOutcome =
  | { kind: 'completed'; result: CalculationResult; fromCache: boolean }
  | { kind: 'pending'; calculationId: string; fingerprint: string };

// 対話モード（キャッシュ）と確率モード（キュー）の共通契約
export interface CalculationStrategy {
  execute(input: CalculationInput, onProgress?: ProgressSink): Promise<StrategyOutcome>;
  shouldPersist(): boolean;
  shouldCache(): boolean;
  name(): string;
}
