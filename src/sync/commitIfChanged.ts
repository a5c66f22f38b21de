import type { GitClient } from '../git/gitClient.js';
import type { SyncOutcome, SyncTarget } from '../types.js';
import type { Logger } from '../utils/log.js';
import { formatChangelog, formatDiffSummary } from './changelog.js';

export interface CommitIfChangedArgs {
  git: GitClient;
  logger: Logger;
  repoDir: string;
  originRemote: string;
  target: SyncTarget;
  path: string;
  message: string;
  source: string;
  changelog: boolean;
  now?: () => Date;
}

/**
 * Stage `path`; when it differs from HEAD make exactly one commit with the
 * fixed message and push it. Byte-identical content commits nothing.
 */
export async function commitIfChanged(args: CommitIfChangedArgs): Promise<SyncOutcome> {
  const { git, logger, repoDir, path } = args;

  await git.add(repoDir, path);
  const changed = await git.hasStagedChanges(repoDir, path);
  if (!changed) {
    logger.info(`   ℹ️  ${path} unchanged, nothing to commit`);
    return { target: args.target, path, status: 'unchanged' };
  }

  const diff = await git.diffStat(repoDir, path);
  logger.info(`   ✓ ${path} changed (${formatDiffSummary(diff)})`);

  const body = args.changelog
    ? formatChangelog({ source: args.source, syncedAt: (args.now ?? (() => new Date()))(), diff })
    : undefined;
  const commitSha = await git.commit(repoDir, path, args.message, body);
  logger.info(`   ✓ Committed ${commitSha.slice(0, 8)}: ${args.message}`);

  logger.info(`   → Pushing to ${args.originRemote}...`);
  await git.push(repoDir, args.originRemote);
  logger.info('   ✓ Pushed');

  return { target: args.target, path, status: 'pushed', commitSha, diff };
}
