// src/service/calculationStore.ts
//
// 目的:
// - 計算レコード（calculations）とケース（cases）の永続化インターフェース。
// - メモリ実装を同じファイルに置く（テスト・CLI 用）。Postgres 実装は pgCalculationStore.ts。
// 前後関係:
// - ステータス遷移は updateCalculation で検証する（model/calculationRecord.ts）。
// - transaction() 内の session で行った変更は、例外時にまとめて取り消される。
import { randomUUID } from 'node:crypto';
import {
  assertStatusTransition,
  type CalculationRecord,
  type CalculationRecordUpdate,
  type CaseCalculationStats,
  type CaseRecord,
  type NewCalculationRecord,
} from '@/model/calculationRecord';
import { CalculationNotFoundError } from '@/model/errors';

export interface FindCaseOptions {
  // 行ロック（SELECT ... FOR UPDATE）。transaction 内でのみ意味を持つ。
  forUpdate?: boolean;
}

export interface CalculationSession {
  createCalculation(data: NewCalculationRecord): Promise<CalculationRecord>;
  findCalculation(id: string): Promise<CalculationRecord | null>;
  updateCalculation(
    id: string,
    update: CalculationRecordUpdate
  ): Promise<CalculationRecord>;
  deleteCalculation(id: string): Promise<boolean>;
  findLatestCompletedByFingerprint(
    fingerprint: string
  ): Promise<CalculationRecord | null>;
  findDueForDeletion(now: Date): Promise<CalculationRecord[]>;
  findCase(caseId: number, options?: FindCaseOptions): Promise<CaseRecord | null>;
  setCurrentCalculation(
    caseId: number,
    calculationId: string,
    fingerprint: string
  ): Promise<void>;
  countCaseCalculations(caseId: number): Promise<CaseCalculationStats>;
}

export interface CalculationStore extends CalculationSession {
  transaction<T>(work: (session: CalculationSession) => Promise<T>): Promise<T>;
}

export const newCalculationRecord = (
  data: NewCalculationRecord,
  id: string,
  now: Date
): CalculationRecord => ({
  id,
  caseId: data.caseId,
  fingerprint: data.fingerprint,
  mode: data.mode,
  status: 'pending',
  inputParams: data.inputParams,
  progressPercentage: 0,
  progressMessage: null,
  iterationsTotal: data.iterationsTotal,
  iterationsCompleted: null,
  startedAt: null,
  completedAt: null,
  failedAt: null,
  cancelledAt: null,
  executionTimeSeconds: null,
  engineeringResults: null,
  productionResults: null,
  salesResults: null,
  capexResults: null,
  opexResults: null,
  taxResults: null,
  finalMetrics: null,
  distributions: null,
  errorMessage: null,
  errorTrace: null,
  detachAt: null,
  deleteAt: null,
  createdAt: now,
  updatedAt: now,
});

export interface InMemoryCalculationStoreOptions {
  now?: () => Date;
}

export const createInMemoryCalculationStore = ({
  now = () => new Date(),
}: InMemoryCalculationStoreOptions = {}): CalculationStore & {
  calculations: Map<string, CalculationRecord>;
  cases: Map<number, CaseRecord>;
  putCase(caseRecord: CaseRecord): void;
} => {
  const calculations = new Map<string, CalculationRecord>();
  const cases = new Map<number, CaseRecord>();
  let queue: Promise<unknown> = Promise.resolve();

  const ensureCalculation = (id: string) => {
    const record = calculations.get(id);
    if (!record) {
      throw new CalculationNotFoundError(id);
    }
    return record;
  };

  const session: CalculationSession = {
    async createCalculation(data) {
      const record = newCalculationRecord(data, randomUUID(), now());
      calculations.set(record.id, record);
      return structuredClone(record);
    },

    async findCalculation(id) {
      const record = calculations.get(id);
      return record ? structuredClone(record) : null;
    },

    async updateCalculation(id, update) {
      const current = ensureCalculation(id);
      if (update.status && update.status !== current.status) {
        assertStatusTransition(current.status, update.status);
      }
      const next: CalculationRecord = {
        ...current,
        ...structuredClone(update),
        updatedAt: now(),
      };
      calculations.set(id, next);
      return structuredClone(next);
    },

    async deleteCalculation(id) {
      return calculations.delete(id);
    },

    async findLatestCompletedByFingerprint(fingerprint) {
      const candidates = Array.from(calculations.values())
        .filter(
          (record) =>
            record.fingerprint === fingerprint &&
            record.status === 'completed' &&
            record.deleteAt === null
        )
        .sort(
          (a, b) =>
            (b.completedAt?.getTime() ?? 0) - (a.completedAt?.getTime() ?? 0)
        );
      return candidates[0] ? structuredClone(candidates[0]) : null;
    },

    async findDueForDeletion(at) {
      return Array.from(calculations.values())
        .filter(
          (record) =>
            record.deleteAt !== null && record.deleteAt.getTime() <= at.getTime()
        )
        .map((record) => structuredClone(record));
    },

    async findCase(caseId) {
      const found = cases.get(caseId);
      return found ? { ...found } : null;
    },

    async setCurrentCalculation(caseId, calculationId, fingerprint) {
      cases.set(caseId, {
        id: caseId,
        currentCalculationId: calculationId,
        currentCalculationFingerprint: fingerprint,
      });
    },

    async countCaseCalculations(caseId) {
      const records = Array.from(calculations.values()).filter(
        (record) => record.caseId === caseId
      );
      return {
        total: records.length,
        active: records.filter((record) => record.deleteAt === null).length,
        completed: records.filter((record) => record.status === 'completed')
          .length,
        scheduled_for_deletion: records.filter(
          (record) => record.deleteAt !== null
        ).length,
      };
    },
  };

  return {
    ...session,

    calculations,
    cases,

    putCase(caseRecord) {
      cases.set(caseRecord.id, { ...caseRecord });
    },

    // トランザクションは直列に実行する。失敗したら session が触れた行だけ元に戻す
    transaction<T>(work: (tx: CalculationSession) => Promise<T>): Promise<T> {
      const run = async () => {
        const calculationImages = new Map<string, CalculationRecord | null>();
        const caseImages = new Map<number, CaseRecord | null>();
        const rememberCalculation = (id: string) => {
          if (calculationImages.has(id)) return;
          const record = calculations.get(id);
          calculationImages.set(id, record ? structuredClone(record) : null);
        };
        const rememberCase = (caseId: number) => {
          if (caseImages.has(caseId)) return;
          const record = cases.get(caseId);
          caseImages.set(caseId, record ? { ...record } : null);
        };

        const tx: CalculationSession = {
          ...session,
          async createCalculation(data) {
            const created = await session.createCalculation(data);
            calculationImages.set(created.id, null);
            return created;
          },
          async updateCalculation(id, update) {
            rememberCalculation(id);
            return session.updateCalculation(id, update);
          },
          async deleteCalculation(id) {
            rememberCalculation(id);
            return session.deleteCalculation(id);
          },
          async setCurrentCalculation(caseId, calculationId, fingerprint) {
            rememberCase(caseId);
            return session.setCurrentCalculation(caseId, calculationId, fingerprint);
          },
        };

        try {
          return await work(tx);
        } catch (error) {
          for (const [id, image] of calculationImages) {
            if (image) calculations.set(id, image);
            else calculations.delete(id);
          }
          for (const [caseId, image] of caseImages) {
            if (image) cases.set(caseId, image);
            else cases.delete(caseId);
          }
          throw error;
        }
      };
      const result = queue.then(run, run);
      queue = result.catch(() => undefined);
      return result;
    },
  };
};
