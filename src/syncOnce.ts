import { getEnv } from './config/env.js';
import { createBackend } from './db/backend.js';
import { errorMessage } from './errors.js';
import { runSyncOnce } from './scheduler/orchestrator.js';

// Run the full sync once (manual dispatch / CI step)
const env = getEnv();
const backend = createBackend(env);

await runSyncOnce({ config: env, backend })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error('Sync failed:', errorMessage(err));
    process.exitCode = 1;
  })
  .finally(async () => {
    await backend.close();
  });
