import crypto from 'node:crypto';
import os from 'node:os';
import path from 'node:path';
import type { Env } from '../config/env.js';
import type { SyncBackend } from '../db/backend.js';
import { errorMessage } from '../errors.js';
import { GitClient } from '../git/gitClient.js';
import { withBranchLease } from '../lock/branchLease.js';
import { syncEpithets } from '../sync/epithetSync.js';
import { syncEtymologies } from '../sync/etymologySync.js';
import type { SyncOutcome, SyncRunRecord, SyncRunResult, SyncTarget } from '../types.js';
import { banner, createLogger, RULE, step, type Logger } from '../utils/log.js';
import { runCommand, type CommandRunner } from '../utils/process.js';

export type SyncConfig = Pick<
  Env,
  | 'REPO_DIR'
  | 'ORIGIN_REMOTE'
  | 'ORIGIN_URL'
  | 'UPSTREAM_REMOTE'
  | 'UPSTREAM_URL'
  | 'UPSTREAM_BRANCH'
  | 'EPITHETS_PATH'
  | 'ETYMOLOGIES_PATH'
  | 'GENERATOR_COMMAND'
  | 'GENERATOR_SETUP_COMMAND'
  | 'GENERATOR_TIMEOUT_SECONDS'
  | 'GIT_USER_NAME'
  | 'GIT_USER_EMAIL'
  | 'EPITHET_COMMIT_MESSAGE'
  | 'ETYMOLOGY_COMMIT_MESSAGE'
  | 'COMMIT_CHANGELOG'
  | 'LOCK_TTL_SECONDS'
  | 'LOCK_WAIT_RETRIES'
>;

export interface OrchestratorDeps {
  config: SyncConfig;
  backend: Pick<SyncBackend, 'lease' | 'runs'>;
  git?: GitClient;
  run?: CommandRunner;
  logger?: Logger;
  now?: () => Date;
  /** Identifies this process as lease holder */
  holder?: string;
  leaseBackoffMs?: { base: number; max: number };
}

export interface RunSyncOptions {
  /** Defaults to both, epithets first */
  targets?: SyncTarget[];
}

export const ALL_TARGETS: readonly SyncTarget[] = ['epithets', 'etymologies'];

function defaultHolder(): string {
  return `${os.hostname()}:${process.pid}:${crypto.randomUUID().slice(0, 8)}`;
}

/**
 * One pipeline run: epithets to completion (push included), then
 * etymologies, all under the branch lease. A failing branch aborts the run;
 * what an earlier branch already pushed stays pushed.
 */
export async function runSyncOnce(deps: OrchestratorDeps, opts: RunSyncOptions = {}): Promise<SyncRunResult> {
  const { config, backend } = deps;
  const git = deps.git ?? new GitClient(deps.run);
  const run = deps.run ?? runCommand;
  const logger = deps.logger ?? createLogger('sync');
  const now = deps.now ?? (() => new Date());
  const targets = new Set(opts.targets ?? ALL_TARGETS);
  const repoDir = path.resolve(config.REPO_DIR);

  banner(logger, '🚀 SYNC RUN STARTED');

  const runId = crypto.randomUUID();
  const startedAt = now();
  const result: SyncRunResult = { epithets: null, etymologies: null };

  try {
    if (!(await git.isRepository(repoDir))) {
      if (!config.ORIGIN_URL) {
        throw new Error(`${repoDir} is not a git repository and ORIGIN_URL is not set`);
      }
      logger.info(`📥 Cloning ${config.ORIGIN_URL} into ${repoDir}...`);
      await git.clone(config.ORIGIN_URL, repoDir);
    }

    const branch = await git.currentBranch(repoDir);
    const leaseKey = `${config.ORIGIN_REMOTE}:${branch}`;

    await withBranchLease(
      backend.lease,
      {
        key: leaseKey,
        holder: deps.holder ?? defaultHolder(),
        ttlSeconds: config.LOCK_TTL_SECONDS,
        waitRetries: config.LOCK_WAIT_RETRIES,
        baseDelayMs: deps.leaseBackoffMs?.base,
        maxDelayMs: deps.leaseBackoffMs?.max,
        logger
      },
      async () => {
        logger.info(`🔄 Fast-forwarding ${branch}...`);
        await git.pullFastForward(repoDir);

        logger.info(`👤 Commit identity: ${config.GIT_USER_NAME} <${config.GIT_USER_EMAIL}>`);
        await git.configureIdentity(repoDir, { name: config.GIT_USER_NAME, email: config.GIT_USER_EMAIL });

        if (targets.has('epithets')) {
          step(logger, 'STEP 1: EPITHET SYNC');
          result.epithets = await syncEpithets({
            git,
            logger,
            repoDir,
            originRemote: config.ORIGIN_REMOTE,
            upstream: { remote: config.UPSTREAM_REMOTE, url: config.UPSTREAM_URL, branch: config.UPSTREAM_BRANCH },
            path: config.EPITHETS_PATH,
            commitMessage: config.EPITHET_COMMIT_MESSAGE,
            changelog: config.COMMIT_CHANGELOG,
            now
          });
        }

        if (targets.has('etymologies')) {
          step(logger, 'STEP 2: ETYMOLOGY SYNC');
          result.etymologies = await syncEtymologies({
            git,
            run,
            logger,
            repoDir,
            originRemote: config.ORIGIN_REMOTE,
            generator: {
              command: config.GENERATOR_COMMAND,
              setupCommand: config.GENERATOR_SETUP_COMMAND,
              timeoutMs: config.GENERATOR_TIMEOUT_SECONDS * 1000
            },
            epithetsPath: config.EPITHETS_PATH,
            path: config.ETYMOLOGIES_PATH,
            commitMessage: config.ETYMOLOGY_COMMIT_MESSAGE,
            changelog: config.COMMIT_CHANGELOG,
            now
          });
        }
      }
    );
  } catch (err) {
    logger.error('❌ Sync run failed:', err);
    await recordRun(deps, logger, buildRecord(runId, startedAt, now(), result, err));
    throw err;
  }

  await recordRun(deps, logger, buildRecord(runId, startedAt, now(), result, null));

  banner(logger, '✅ SYNC RUN FINISHED');
  logger.info(`   Epithets:    ${describeOutcome(result.epithets)}`);
  logger.info(`   Etymologies: ${describeOutcome(result.etymologies)}`);
  logger.info(RULE);

  return result;
}

function describeOutcome(outcome: SyncOutcome | null): string {
  if (!outcome) return 'skipped';
  if (outcome.status === 'unchanged') return 'unchanged';
  return `pushed ${outcome.commitSha?.slice(0, 8) ?? ''}`.trim();
}

function buildRecord(id: string, startedAt: Date, finishedAt: Date, result: SyncRunResult, err: unknown): SyncRunRecord {
  return {
    id,
    startedAt,
    finishedAt,
    status: err == null ? 'success' : 'failed',
    epithets: result.epithets?.status ?? null,
    etymologies: result.etymologies?.status ?? null,
    error: err == null ? null : errorMessage(err)
  };
}

async function recordRun(deps: OrchestratorDeps, logger: Logger, record: SyncRunRecord): Promise<void> {
  try {
    await deps.backend.runs.record(record);
  } catch (err) {
    // Logged, not rethrown: the run's own error is what the caller sees
    logger.error(`Failed to record run ${record.id}:`, err);
  }
}
