// src/model/errors.ts
//
// 目的:
// - 計算コアが投げる例外の分類。
//   - 入力エラー: エンジンに渡す前に弾く
//   - 計算エラー: ステージ/指標ごとに発生（PIのゼロ除算など）
//   - キャンセル/タイムアウト: ワーカーの試行を中断する
// - インフラ由来の例外（pg, キャッシュ）はラップせずにそのまま伝播させる。
export type CalculationErrorCode =
  | 'INVALID_INPUT'
  | 'COMPUTATION_FAILED'
  | 'CANCELLED'
  | 'TIMEOUT'
  | 'CALCULATION_NOT_FOUND'
  | 'CASE_NOT_FOUND'
  | 'INVALID_STATUS_TRANSITION';

export class CalculationError extends Error {
  readonly code: CalculationErrorCode;

  constructor(code: CalculationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidCalculationInputError extends CalculationError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export type PipelineStageName =
  | 'engineering'
  | 'production'
  | 'sales'
  | 'capex'
  | 'opex'
  | 'taxes'
  | 'final_metrics';

export class ComputationError extends CalculationError {
  readonly stage: PipelineStageName;
  readonly metric: string | null;

  constructor(stage: PipelineStageName, message: string, metric?: string) {
    super('COMPUTATION_FAILED', message);
    this.stage = stage;
    this.metric = metric ?? null;
  }
}

export class CalculationCancelledError extends CalculationError {
  constructor(calculationId?: string) {
    super(
      'CANCELLED',
      calculationId
        ? `Calculation ${calculationId} was cancelled`
        : 'Calculation was cancelled'
    );
  }
}

export class CalculationTimeoutError extends CalculationError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super('TIMEOUT', `Calculation attempt exceeded ${timeoutSeconds}s`);
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class CalculationNotFoundError extends CalculationError {
  constructor(calculationId: string) {
    super('CALCULATION_NOT_FOUND', `計算が見つかりません: ${calculationId}`);
  }
}

export class CaseNotFoundError extends CalculationError {
  constructor(caseId: number) {
    super('CASE_NOT_FOUND', `ケースが見つかりません: ${caseId}`);
  }
}

export class InvalidStatusTransitionError extends CalculationError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(
      'INVALID_STATUS_TRANSITION',
      `ステータスを ${from} から ${to} へ変更できません`
    );
    this.from = from;
    this.to = to;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorTrace = (error: unknown): string | null =>
  error instanceof Error ? (error.stack ?? null) : null;
