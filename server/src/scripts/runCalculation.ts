#!/usr/bin/env node
// 入力 JSON を読み込み、DB を使わずにメモリ上のアダプタで計算して結果を表示する。
import fs from 'node:fs';
import process from 'node:process';
import { loadCalculationSettings } from '../config';
import type { CalculationWorkUnit } from '../model/calculation';
import { caseTopic } from '../model/notification';
import { parseCalculationInput } from '../model/guards';
import { createInMemoryCalculationStore } from '../service/calculationStore';
import { createCalculationRuntime } from '../service/calculationRuntimeFactory';
import { createInMemoryNotifier } from '../service/notifier';
import { createInMemoryWorkQueue } from '../service/workQueue';

const getArgValue = (flag: string): string | undefined => {
  const index = process.argv.indexOf(flag);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const printUsageAndExit = (message?: string, code = 1): never => {
  if (message) console.error(message);
  console.info(
    'Usage: npm run calculation:run -- --file <INPUT_JSON> [--iterations <N>] [--seed <SEED>]'
  );
  process.exit(code);
};

async function main() {
  const file = getArgValue('--file') ?? printUsageAndExit('--file is required');
  const iterationsArg = getArgValue('--iterations');
  const seedArg = getArgValue('--seed');

  const env = { ...process.env };
  if (seedArg !== undefined) env.CALC_NOISE_SEED = seedArg;
  const settings = loadCalculationSettings(env);

  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  const parsed = parseCalculationInput(raw);
  const iterations = iterationsArg === undefined ? parsed.iterations : Number(iterationsArg);
  if (iterations !== null && (!Number.isInteger(iterations) || iterations <= 0)) {
    printUsageAndExit('iterations must be a positive integer');
  }
  const input = { ...parsed, iterations };

  const store = createInMemoryCalculationStore();
  store.putCase({
    id: input.caseId,
    currentCalculationId: null,
    currentCalculationFingerprint: null,
  });
  const notifier = createInMemoryNotifier();
  notifier.subscribe(caseTopic(input.caseId), (notification) => {
    if (notification.event === 'calculation.progress') {
      console.info(
        `[calculation:run] ${notification.payload.percentage}% ${notification.payload.message}`
      );
    }
  });

  const { service, workerPool } = createCalculationRuntime({
    settings,
    store,
    queue: createInMemoryWorkQueue<CalculationWorkUnit>({
      name: settings.async.queueName,
    }),
    notifier,
  });

  const outcome = await service.submit(input);
  if (outcome.kind === 'completed') {
    console.info('=== Calculation Result ===');
    console.info(JSON.stringify(outcome.result, null, 2));
    return;
  }
  if (outcome.kind === 'existing') {
    console.info(JSON.stringify(outcome.result, null, 2));
    return;
  }

  console.info(`[calculation:run] Queued ${outcome.calculationId} (${outcome.fingerprint})`);
  while ((await workerPool.runOnce()) !== 'idle') {
    // キューが空になるまで処理する（リトライはバックオフ後に idle になる）
  }

  const status = await service.getStatus(outcome.calculationId);
  if (!status.result) {
    const record = store.calculations.get(outcome.calculationId);
    throw new Error(
      `計算ジョブが失敗しました。失敗理由: ${record?.errorMessage ?? '不明'}`
    );
  }
  console.info('=== Calculation Result ===');
  console.info(JSON.stringify(status.result, null, 2));
}

main().catch((error: unknown) => {
  console.error(
    '[calculation:run] Failed:',
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
});
