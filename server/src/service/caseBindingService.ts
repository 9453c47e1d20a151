// src/service/caseBindingService.ts
//
// 目的:
// - ケースと計算レコードの紐付けを管理する。
//   - 重複排除: 同じフィンガープリントの完了済みレコードを探す
//   - 付け替え: ケースの current を新しい計算へ向け、旧計算は猶予期間付きで切り離す
//   - 掃除: delete_at を過ぎたレコードを 1 件ずつ削除する
// 前後関係:
// - 付け替えは 1 トランザクション内でケース行をロックして行う。
// - detach_at は情報用。重複排除から外れるのは delete_at が入ったとき。
import type { CalculationInput } from '@/model/calculation';
import type {
  CalculationRecord,
  CaseCalculationStats,
} from '@/model/calculationRecord';
import { CalculationNotFoundError, CaseNotFoundError } from '@/model/errors';
import { logger } from '@/logger';
import type { CalculationSession, CalculationStore } from './calculationStore';
import { generateFingerprint } from './fingerprint';

export const DEFAULT_GRACE_PERIOD_DAYS = 7;
export const DEFAULT_DELETE_AFTER_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export const addDays = (date: Date, days: number): Date =>
  new Date(date.getTime() + days * DAY_MS);

export interface CaseBindingServiceDeps {
  store: CalculationStore;
  gracePeriodDays?: number;
  deleteAfterDays?: number;
  now?: () => Date;
}

export interface CleanupOptions {
  dryRun?: boolean;
}

export interface CaseBindingService {
  findExistingCalculation(input: CalculationInput): Promise<CalculationRecord | null>;
  // session を渡すと呼び出し元のトランザクション内で実行する
  bindCalculationToCase(
    caseId: number,
    calculationId: string,
    session?: CalculationSession
  ): Promise<void>;
  scheduleDetachment(calculationId: string): Promise<CalculationRecord | null>;
  cancelDeletion(calculationId: string): Promise<CalculationRecord | null>;
  cleanupOldCalculations(options?: CleanupOptions): Promise<number>;
  getCaseCalculationStats(caseId: number): Promise<CaseCalculationStats>;
}

export const createCaseBindingService = ({
  store,
  gracePeriodDays = DEFAULT_GRACE_PERIOD_DAYS,
  deleteAfterDays = DEFAULT_DELETE_AFTER_DAYS,
  now = () => new Date(),
}: CaseBindingServiceDeps): CaseBindingService => {
  const detach = async (session: CalculationSession, calculationId: string) => {
    const calculation = await session.findCalculation(calculationId);
    if (!calculation) return null;

    const detachAt = addDays(now(), gracePeriodDays);
    const deleteAt = addDays(detachAt, deleteAfterDays);
    const updated = await session.updateCalculation(calculationId, {
      detachAt,
      deleteAt,
    });
    logger.log('Calculation detachment scheduled', {
      calculationId,
      detachAt: detachAt.toISOString(),
      deleteAt: deleteAt.toISOString(),
    });
    return updated;
  };

  const bind = async (
    session: CalculationSession,
    caseId: number,
    calculationId: string
  ) => {
    const caseRecord = await session.findCase(caseId, { forUpdate: true });
    if (!caseRecord) {
      throw new CaseNotFoundError(caseId);
    }
    const calculation = await session.findCalculation(calculationId);
    if (!calculation) {
      throw new CalculationNotFoundError(calculationId);
    }

    const previousId = caseRecord.currentCalculationId;
    if (previousId !== null && previousId !== calculationId) {
      await detach(session, previousId);
    }
    // 切り離し済みのレコードを再び current にする場合は削除予定を取り消す
    if (calculation.detachAt !== null || calculation.deleteAt !== null) {
      await session.updateCalculation(calculationId, {
        detachAt: null,
        deleteAt: null,
      });
    }

    await session.setCurrentCalculation(
      caseId,
      calculationId,
      calculation.fingerprint
    );
    logger.log('Calculation bound to case', {
      caseId,
      calculationId,
      fingerprint: calculation.fingerprint,
    });
  };

  return {
    async findExistingCalculation(input) {
      const fingerprint = generateFingerprint(input);
      const existing = await store.findLatestCompletedByFingerprint(fingerprint);
      if (existing) {
        logger.log('Found existing calculation by fingerprint', {
          fingerprint,
          calculationId: existing.id,
          completedAt: existing.completedAt?.toISOString() ?? null,
        });
      }
      return existing;
    },

    bindCalculationToCase(caseId, calculationId, session) {
      if (session) {
        return bind(session, caseId, calculationId);
      }
      return store.transaction((tx) => bind(tx, caseId, calculationId));
    },

    scheduleDetachment(calculationId) {
      return store.transaction((session) => detach(session, calculationId));
    },

    async cancelDeletion(calculationId) {
      const calculation = await store.findCalculation(calculationId);
      if (!calculation) return null;
      const updated = await store.updateCalculation(calculationId, {
        detachAt: null,
        deleteAt: null,
      });
      logger.log('Calculation deletion cancelled', { calculationId });
      return updated;
    },

    async cleanupOldCalculations({ dryRun = false } = {}) {
      const due = await store.findDueForDeletion(now());
      if (dryRun) {
        logger.log('Cleanup dry run', {
          candidates: due.map((record) => record.id),
        });
        return due.length;
      }

      let deleted = 0;
      for (const record of due) {
        try {
          logger.log('Deleting old calculation', {
            calculationId: record.id,
            fingerprint: record.fingerprint,
            deleteAt: record.deleteAt?.toISOString() ?? null,
          });
          if (await store.deleteCalculation(record.id)) {
            deleted += 1;
          }
        } catch (error) {
          // 1 件の失敗で掃除全体を止めない
          logger.error('Failed to delete calculation', { calculationId: record.id }, error);
        }
      }

      if (deleted > 0) {
        logger.log('Cleanup completed', { deletedCount: deleted });
      }
      return deleted;
    },

    getCaseCalculationStats(caseId) {
      return store.countCaseCalculations(caseId);
    },
  };
};
