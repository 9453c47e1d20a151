import { createInMemoryCalculationStore } from '../service/calculationStore';
import { CalculationNotFoundError, InvalidStatusTransitionError } from '../model/errors';
import type { NewCalculationRecord } from '../model/calculationRecord';

const newRecord = (overrides: Partial<NewCalculationRecord> = {}): NewCalculationRecord => ({
  caseId: 1,
  fingerprint: 'a'.repeat(64),
  mode: 'stochastic',
  inputParams: null,
  iterationsTotal: 100,
  ...overrides,
});

describe('計算レコードストア（メモリ実装）', () => {
  test('作成したレコードは pending で進捗 0', async () => {
    const store = createInMemoryCalculationStore({
      now: () => new Date('2025-01-01T00:00:00Z'),
    });
    const record = await store.createCalculation(newRecord());
    expect(record.status).toBe('pending');
    expect(record.progressPercentage).toBe(0);
    expect(record.createdAt.toISOString()).toBe('2025-01-01T00:00:00.000Z');
    expect(await store.findCalculation(record.id)).toEqual(record);
  });

  test('返した値を書き換えても保存内容は変わらない', async () => {
    const store = createInMemoryCalculationStore();
    const record = await store.createCalculation(newRecord());
    record.progressPercentage = 99;
    expect((await store.findCalculation(record.id))?.progressPercentage).toBe(0);
  });

  test('許可された遷移だけ受け付ける', async () => {
    const store = createInMemoryCalculationStore();
    const record = await store.createCalculation(newRecord());

    await expect(
      store.updateCalculation(record.id, { status: 'completed' })
    ).rejects.toBeInstanceOf(InvalidStatusTransitionError);

    await store.updateCalculation(record.id, { status: 'processing' });
    await store.updateCalculation(record.id, { status: 'failed' });
    // リトライ
    await store.updateCalculation(record.id, { status: 'processing' });
    const completed = await store.updateCalculation(record.id, { status: 'completed' });
    expect(completed.status).toBe('completed');

    await expect(
      store.updateCalculation(record.id, { status: 'processing' })
    ).rejects.toThrow('ステータスを completed から processing へ変更できません');
  });

  test('同じステータスのままの更新は遷移チェックしない', async () => {
    const store = createInMemoryCalculationStore();
    const record = await store.createCalculation(newRecord());
    await store.updateCalculation(record.id, { status: 'processing' });
    const updated = await store.updateCalculation(record.id, {
      status: 'processing',
      progressPercentage: 40,
    });
    expect(updated.progressPercentage).toBe(40);
  });

  test('存在しないレコードの更新は例外', async () => {
    const store = createInMemoryCalculationStore();
    await expect(
      store.updateCalculation('missing', { progressPercentage: 1 })
    ).rejects.toBeInstanceOf(CalculationNotFoundError);
  });

  test('フィンガープリント検索は削除予定でない最新の完了レコードを返す', async () => {
    let clock = new Date('2025-01-01T00:00:00Z');
    const store = createInMemoryCalculationStore({ now: () => clock });
    const fingerprint = 'b'.repeat(64);
    const complete = async (completedAt: string) => {
      const record = await store.createCalculation(newRecord({ fingerprint }));
      await store.updateCalculation(record.id, { status: 'processing' });
      return store.updateCalculation(record.id, {
        status: 'completed',
        completedAt: new Date(completedAt),
      });
    };

    const older = await complete('2025-01-02T00:00:00Z');
    const newer = await complete('2025-01-03T00:00:00Z');
    await store.createCalculation(newRecord({ fingerprint }));
    expect((await store.findLatestCompletedByFingerprint(fingerprint))?.id).toBe(newer.id);

    clock = new Date('2025-01-04T00:00:00Z');
    await store.updateCalculation(newer.id, { deleteAt: new Date('2025-02-01T00:00:00Z') });
    expect((await store.findLatestCompletedByFingerprint(fingerprint))?.id).toBe(older.id);
    expect(await store.findLatestCompletedByFingerprint('c'.repeat(64))).toBeNull();
  });

  test('削除期限を過ぎたレコードを列挙する', async () => {
    const store = createInMemoryCalculationStore();
    const due = await store.createCalculation(newRecord());
    const later = await store.createCalculation(newRecord());
    await store.createCalculation(newRecord());
    await store.updateCalculation(due.id, { deleteAt: new Date('2025-01-01T00:00:00Z') });
    await store.updateCalculation(later.id, { deleteAt: new Date('2025-03-01T00:00:00Z') });

    const found = await store.findDueForDeletion(new Date('2025-02-01T00:00:00Z'));
    expect(found.map((record) => record.id)).toEqual([due.id]);
  });

  test('ケースごとの件数を集計する', async () => {
    const store = createInMemoryCalculationStore();
    const a = await store.createCalculation(newRecord());
    const b = await store.createCalculation(newRecord());
    await store.createCalculation(newRecord({ caseId: 2 }));
    await store.updateCalculation(a.id, { status: 'processing' });
    await store.updateCalculation(a.id, { status: 'completed' });
    await store.updateCalculation(b.id, { deleteAt: new Date() });

    expect(await store.countCaseCalculations(1)).toEqual({
      total: 2,
      active: 1,
      completed: 1,
      scheduled_for_deletion: 1,
    });
  });

  test('トランザクション内で例外が起きたら変更を戻す', async () => {
    const store = createInMemoryCalculationStore();
    store.putCase({ id: 1, currentCalculationId: null, currentCalculationFingerprint: null });
    const record = await store.createCalculation(newRecord());

    await expect(
      store.transaction(async (session) => {
        await session.updateCalculation(record.id, { progressMessage: 'changed' });
        await session.setCurrentCalculation(1, record.id, record.fingerprint);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect((await store.findCalculation(record.id))?.progressMessage).toBeNull();
    expect((await store.findCase(1))?.currentCalculationId).toBeNull();
  });

  test('ロールバックはトランザクション外の同時書き込みを消さない', async () => {
    const store = createInMemoryCalculationStore();
    const inside = await store.createCalculation(newRecord());
    const outside = await store.createCalculation(newRecord({ fingerprint: 'b'.repeat(64) }));
    let created = '';
    let started = () => {};
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const failing = store.transaction(async (session) => {
      await session.updateCalculation(inside.id, { progressMessage: 'inside' });
      created = (await session.createCalculation(newRecord())).id;
      started();
      await gate;
      throw new Error('boom');
    });
    await running;
    await store.updateCalculation(outside.id, { progressMessage: 'outside' });
    const late = await store.createCalculation(newRecord());
    release();

    await expect(failing).rejects.toThrow('boom');
    expect((await store.findCalculation(inside.id))?.progressMessage).toBeNull();
    expect(await store.findCalculation(created)).toBeNull();
    expect((await store.findCalculation(outside.id))?.progressMessage).toBe('outside');
    expect(await store.findCalculation(late.id)).not.toBeNull();
  });

  test('トランザクションは直列に実行される', async () => {
    const store = createInMemoryCalculationStore();
    const order: string[] = [];
    const first = store.transaction(async () => {
      order.push('first:start');
      await new Promise((resolve) => setImmediate(resolve));
      order.push('first:end');
    });
    const second = store.transaction(async () => {
      order.push('second');
    });
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });
});
