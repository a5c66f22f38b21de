import type { GitClient } from '../git/gitClient.js';
import type { SyncOutcome } from '../types.js';
import type { Logger } from '../utils/log.js';
import { commitIfChanged } from './commitIfChanged.js';

export interface EpithetSyncDeps {
  git: GitClient;
  logger: Logger;
  repoDir: string;
  originRemote: string;
  upstream: { remote: string; url: string; branch: string };
  path: string;
  commitMessage: string;
  changelog: boolean;
  now?: () => Date;
}

/**
 * Mirror one file verbatim from the upstream branch head into the working
 * copy. Whatever upstream has wins; there is no merge.
 */
export async function syncEpithets(deps: EpithetSyncDeps): Promise<SyncOutcome> {
  const { git, logger, repoDir, upstream } = deps;
  const ref = `${upstream.remote}/${upstream.branch}`;

  logger.info(`🔗 Upstream remote '${upstream.remote}' → ${upstream.url}`);
  const remoteState = await git.ensureRemote(repoDir, upstream.remote, upstream.url);
  if (remoteState !== 'unchanged') logger.info(`   ✓ Remote ${remoteState}`);

  logger.info(`📥 Fetching ${ref}...`);
  await git.fetch(repoDir, upstream.remote, upstream.branch);

  logger.info(`📄 Checking out ${deps.path} from ${ref}...`);
  await git.checkoutPathFromRef(repoDir, `refs/remotes/${ref}`, deps.path);

  return await commitIfChanged({
    git,
    logger,
    repoDir,
    originRemote: deps.originRemote,
    target: 'epithets',
    path: deps.path,
    message: deps.commitMessage,
    source: `${upstream.url}@${upstream.branch}`,
    changelog: deps.changelog,
    now: deps.now
  });
}
