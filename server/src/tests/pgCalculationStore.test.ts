import {
  buildUpdateStatement,
  createPgCalculationStore,
  mapCalculationRow,
} from '../service/pgCalculationStore';
import {
  CalculationNotFoundError,
  CaseNotFoundError,
  InvalidStatusTransitionError,
} from '../model/errors';
import { createFakeSqlPool } from './helpers/fakeSqlPool';
import { buildStochasticInput } from './helpers/calculationInputs';

const FINGERPRINT = 'f'.repeat(64);

const calculationRow = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: '00000000-0000-4000-8000-000000000001',
  case_id: '1',
  fingerprint: FINGERPRINT,
  mode: 'stochastic',
  status: 'pending',
  input_params: buildStochasticInput(),
  progress_percentage: 0,
  progress_message: null,
  iterations_total: 200,
  iterations_completed: 0,
  started_at: null,
  completed_at: null,
  failed_at: null,
  cancelled_at: null,
  execution_time_seconds: null,
  engineering_results: null,
  production_results: null,
  sales_results: null,
  capex_results: null,
  opex_results: null,
  tax_results: null,
  final_metrics: null,
  distributions: null,
  error_message: null,
  error_trace: null,
  detach_at: null,
  delete_at: null,
  created_at: new Date('2025-01-01T00:00:00Z'),
  updated_at: new Date('2025-01-01T00:00:00Z'),
  ...overrides,
});

describe('計算レコードストア（Postgres 実装）', () => {
  test('行をレコードに変換する（BIGINT と JSON 文字列も読む）', () => {
    const record = mapCalculationRow(
      calculationRow({
        status: 'completed',
        final_metrics: JSON.stringify({
          npv: 1,
          irr: 0.1,
          pi: 1.2,
          payback_period: 3,
          discount_rate: 0.1,
          irr_converged: true,
        }),
        completed_at: '2025-01-02T00:00:00.000Z',
      })
    );
    expect(record.caseId).toBe(1);
    expect(record.status).toBe('completed');
    expect(record.inputParams?.iterations).toBe(200);
    expect(record.finalMetrics).toEqual({
      npv: 1,
      irr: 0.1,
      pi: 1.2,
      payback_period: 3,
      discount_rate: 0.1,
      irr_converged: true,
    });
    expect(record.completedAt?.toISOString()).toBe('2025-01-02T00:00:00.000Z');
  });

  test('未知のステータスは読めない', () => {
    expect(() => mapCalculationRow(calculationRow({ status: 'paused' }))).toThrow(
      '未知のステータスです: paused'
    );
  });

  test('UPDATE 文は指定された列だけを更新し、遷移元を WHERE で絞る', () => {
    const statement = buildUpdateStatement('id-1', {
      status: 'completed',
      progressPercentage: 100,
      finalMetrics: null,
      distributions: {
        npv: {
          mean: 1, median: 1, variance: 0, std_dev: 0, min: 1, max: 1,
          p10: 1, p50: 1, p90: 1, distribution: [1],
        },
        irr: {
          mean: 1, median: 1, variance: 0, std_dev: 0, min: 1, max: 1,
          p10: 1, p50: 1, p90: 1, distribution: [1],
        },
        pi: {
          mean: 1, median: 1, variance: 0, std_dev: 0, min: 1, max: 1,
          p10: 1, p50: 1, p90: 1, distribution: [1],
        },
        payback_period: {
          mean: 1, median: 1, variance: 0, std_dev: 0, min: 1, max: 1,
          p10: 1, p50: 1, p90: 1, distribution: [1],
        },
      },
    });
    expect(statement.text).toBe(
      'UPDATE calculations SET status = $2, progress_percentage = $3, ' +
        'final_metrics = $4::jsonb, distributions = $5::jsonb, updated_at = now() ' +
        'WHERE id = $1 AND status = ANY($6::text[]) RETURNING *'
    );
    expect(statement.values[0]).toBe('id-1');
    expect(statement.values[3]).toBeNull();
    expect(typeof statement.values[4]).toBe('string');
    expect(statement.values[5]).toEqual(['completed', 'processing']);
  });

  test('ステータスを変えない更新には遷移条件を付けない', () => {
    const statement = buildUpdateStatement('id-1', { progressMessage: 'x', deleteAt: undefined });
    expect(statement.text).toBe(
      'UPDATE calculations SET progress_message = $2, updated_at = now() WHERE id = $1 RETURNING *'
    );
    expect(statement.values).toEqual(['id-1', 'x']);
  });

  test('作成時は pending で挿入し、入力は JSON で渡す', async () => {
    const fake = createFakeSqlPool((text) =>
      text.includes('INSERT INTO calculations') ? { rows: [calculationRow()], rowCount: 1 } : undefined
    );
    const store = createPgCalculationStore(fake.pool);
    const record = await store.createCalculation({
      caseId: 1,
      fingerprint: FINGERPRINT,
      mode: 'stochastic',
      inputParams: buildStochasticInput(),
      iterationsTotal: 200,
    });
    expect(record.status).toBe('pending');
    const [insert] = fake.queries;
    expect(insert.values.slice(1, 4)).toEqual([1, FINGERPRINT, 'stochastic']);
    expect(JSON.parse(String(insert.values[4]))).toEqual(buildStochasticInput());
  });

  test('更新が 0 行なら存在しないか遷移不可かを判別する', async () => {
    const fake = createFakeSqlPool((text, values) => {
      if (text.startsWith('SELECT status') && values[0] === 'present') {
        return { rows: [{ status: 'completed' }], rowCount: 1 };
      }
      return undefined;
    });
    const store = createPgCalculationStore(fake.pool);

    await expect(
      store.updateCalculation('missing', { status: 'processing' })
    ).rejects.toBeInstanceOf(CalculationNotFoundError);
    await expect(
      store.updateCalculation('present', { status: 'processing' })
    ).rejects.toThrow(new InvalidStatusTransitionError('completed', 'processing'));
  });

  test('ケース行は FOR UPDATE でロックできる', async () => {
    const fake = createFakeSqlPool((text) =>
      text.includes('FROM cases')
        ? {
            rows: [
              {
                id: '1',
                current_calculation_id: null,
                current_calculation_fingerprint: `${FINGERPRINT}`,
              },
            ],
            rowCount: 1,
          }
        : undefined
    );
    const store = createPgCalculationStore(fake.pool);
    expect(await store.findCase(1, { forUpdate: true })).toEqual({
      id: 1,
      currentCalculationId: null,
      currentCalculationFingerprint: FINGERPRINT,
    });
    expect(fake.queries[0].text).toMatch(/FOR UPDATE$/);
    await store.findCase(1);
    expect(fake.queries[1].text).not.toContain('FOR UPDATE');
  });

  test('存在しないケースへの付け替えは CaseNotFoundError', async () => {
    const store = createPgCalculationStore(createFakeSqlPool().pool);
    await expect(store.setCurrentCalculation(9, 'id', FINGERPRINT)).rejects.toBeInstanceOf(
      CaseNotFoundError
    );
  });

  test('件数は count(*) の文字列を数値にする', async () => {
    const fake = createFakeSqlPool(() => ({
      rows: [{ total: '3', active: '2', completed: '2', scheduled_for_deletion: '1' }],
      rowCount: 1,
    }));
    const store = createPgCalculationStore(fake.pool);
    expect(await store.countCaseCalculations(1)).toEqual({
      total: 3,
      active: 2,
      completed: 2,
      scheduled_for_deletion: 1,
    });
  });

  test('トランザクションは 1 接続で BEGIN/COMMIT し、例外時は ROLLBACK する', async () => {
    const fake = createFakeSqlPool();
    const store = createPgCalculationStore(fake.pool);

    await store.transaction(async (session) => {
      await session.findCalculation('a');
    });
    expect(fake.queries.map((query) => [query.client, query.text])).toEqual([
      ['client', 'BEGIN'],
      ['client', 'SELECT * FROM calculations WHERE id = $1'],
      ['client', 'COMMIT'],
    ]);

    await expect(
      store.transaction(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(fake.queries.slice(3).map((query) => query.text)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(fake.released).toBe(2);
  });
});
