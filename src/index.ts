import { getEnv } from './config/env.js';
import { createBackend } from './db/backend.js';
import { startScheduler } from './scheduler/scheduler.js';

const env = getEnv();
const backend = createBackend(env);
const scheduler = startScheduler(env, backend);

async function shutdown(signal: NodeJS.Signals) {
  // eslint-disable-next-line no-console
  console.log(`Received ${signal}, stopping scheduler`);
  await scheduler.stop();
  await backend.close();
  process.exit(0);
}

process.once('SIGINT', (signal) => {
  shutdown(signal).catch((err) => {
    // eslint-disable-next-line no-console
    console.error('Shutdown failed:', err);
    process.exit(1);
  });
});
process.once('SIGTERM', (signal) => {
  shutdown(signal).catch((err) => {
    // eslint-disable-next-line no-console
    console.error('Shutdown failed:', err);
    process.exit(1);
  });
});
