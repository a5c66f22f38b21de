/**
 * Run one branch of the sync without waiting for the schedule
 *
 * Usage:
 *   npx tsx scripts/run-sync.ts [target]
 *
 * Targets:
 *   epithets     - Mirror epithets.json from upstream
 *   etymologies  - Regenerate etymologies.json
 *   all          - Both, in order (same as npm run sync:once)
 */

import { getEnv } from '../src/config/env.js';
import { createBackend } from '../src/db/backend.js';
import { ALL_TARGETS, runSyncOnce } from '../src/scheduler/orchestrator.js';
import type { SyncTarget } from '../src/types.js';

const arg = process.argv[2] ?? 'all';

function parseTargets(value: string): SyncTarget[] {
  if (value === 'all') return [...ALL_TARGETS];
  if (value === 'epithets' || value === 'etymologies') return [value];
  throw new Error(`Unknown target '${value}' (expected epithets, etymologies or all)`);
}

async function main() {
  const targets = parseTargets(arg);
  const env = getEnv();
  const backend = createBackend(env);
  try {
    const result = await runSyncOnce({ config: env, backend }, { targets });
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await backend.close();
  }
}

main().catch((err) => {
  console.error('Run failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
