import cron, { type ScheduledTask } from 'node-cron';
import type { Env } from '../config/env.js';
import type { SyncBackend } from '../db/backend.js';
import { createLogger, type Logger } from '../utils/log.js';
import { runSyncOnce } from './orchestrator.js';

export interface GuardedJob {
  (): Promise<void>;
  /** Resolves once no run is in flight */
  idle(): Promise<void>;
}

/**
 * Wrap a job so that a tick arriving while the previous run is still going
 * is skipped instead of starting a second, concurrent run.
 */
export function nonOverlapping(name: string, job: () => Promise<unknown>, logger: Logger): GuardedJob {
  let current: Promise<void> | null = null;

  const run = async () => {
    if (current) {
      logger.warn(`⏭️  ${name}: previous run still in progress, skipping this tick`);
      return;
    }
    current = (async () => {
      try {
        await job();
      } catch (err) {
        // The failed run is already recorded; the next tick starts from scratch
        logger.error(`${name} failed:`, err);
      }
    })();
    try {
      await current;
    } finally {
      current = null;
    }
  };

  return Object.assign(run, {
    idle: async () => {
      await current;
    }
  });
}

export interface SchedulerHandle {
  task: ScheduledTask;
  /** Stop ticking and wait for a run in flight to finish */
  stop(): Promise<void>;
}

export function startScheduler(env: Env, backend: SyncBackend): SchedulerHandle {
  const logger = createLogger('scheduler');
  logger.info('Scheduler starting...');

  const job = nonOverlapping('Sync', () => runSyncOnce({ config: env, backend }), logger);

  const task = cron.schedule(
    env.CRON_SYNC_SCHEDULE,
    async () => {
      await job();
    },
    { timezone: env.CRON_TIMEZONE }
  );
  logger.info(`Sync scheduled: ${env.CRON_SYNC_SCHEDULE} (${env.CRON_TIMEZONE})`);

  if (env.RUN_ON_START) {
    logger.info('RUN_ON_START set, running once now');
    void job();
  }

  return {
    task,
    stop: async () => {
      task.stop();
      logger.info('Scheduler stopped, waiting for a run in progress...');
      await job.idle();
    }
  };
}
