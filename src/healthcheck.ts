import { getEnv } from './config/env.js';
import { createBackend } from './db/backend.js';
import { errorMessage } from './errors.js';
import { GitClient } from './git/gitClient.js';
import { runCommand } from './utils/process.js';

async function checkGit() {
  const res = await runCommand('git', ['--version']);
  return { ok: true, version: res.stdout.trim() };
}

async function checkUpstream(git: GitClient, url: string, branch: string) {
  const sha = await git.lsRemote(url, branch);
  if (!sha) return { ok: false, error: `branch '${branch}' not found at ${url}` };
  return { ok: true, head: sha.slice(0, 12) };
}

async function checkWorkingCopy(git: GitClient, dir: string, originUrl: string | undefined) {
  if (await git.isRepository(dir)) {
    return { ok: true, branch: await git.currentBranch(dir) };
  }
  if (originUrl) return { ok: true, note: 'not cloned yet, will clone from ORIGIN_URL' };
  return { ok: false, error: `${dir} is not a git repository and ORIGIN_URL is not set` };
}

async function main() {
  console.log('Healthcheck started');
  const env = getEnv();
  const git = new GitClient();
  const backend = createBackend(env);

  try {
    console.log('Git:', await checkGit());
    console.log('Working copy:', await checkWorkingCopy(git, env.REPO_DIR, env.ORIGIN_URL));
    console.log('Upstream:', await checkUpstream(git, env.UPSTREAM_URL, env.UPSTREAM_BRANCH));

    await backend.ping();
    console.log(`Lease backend (${backend.kind}): ok`);
  } finally {
    await backend.close();
  }

  console.log('Healthcheck finished');
}

await main().catch((e) => {
  console.error('Healthcheck failed:', errorMessage(e));
  process.exitCode = 1;
});
