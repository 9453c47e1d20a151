#!/usr/bin/env node
import process from 'node:process';
import pool from '../../api/db';
import { loadCalculationSettings } from '../config';
import { createCaseBindingService } from '../service/caseBindingService';
import { createPgCalculationStore } from '../service/pgCalculationStore';

const usage = `Usage:
  npm run calculations:cleanup -- [--dry-run]

Deletes calculations whose delete_at has passed.
  --dry-run  list the calculations without deleting them`;

async function main() {
  if (process.argv.includes('--help') || process.argv.includes('-h')) {
    console.info(usage);
    process.exit(0);
  }
  const dryRun = process.argv.includes('--dry-run');
  const settings = loadCalculationSettings();

  const binding = createCaseBindingService({
    store: createPgCalculationStore(pool),
    gracePeriodDays: settings.cleanup.gracePeriodDays,
    deleteAfterDays: settings.cleanup.deleteAfterDays,
  });

  try {
    const count = await binding.cleanupOldCalculations({ dryRun });
    console.info(
      dryRun
        ? `[calculations:cleanup] ${count} calculation(s) would be deleted.`
        : `[calculations:cleanup] Deleted ${count} calculation(s).`
    );
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error(
    '[calculations:cleanup] Failed:',
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
});
