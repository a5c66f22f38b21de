/**
 * Thin wrapper over the git CLI.
 *
 * Every call is a blocking subprocess; failures are classified into
 * GitCliError codes from git's stderr and rethrown, never swallowed.
 */

import { existsSync } from 'node:fs';
import { CommandError, GitCliError } from '../errors.js';
import { runCommand, type CommandResult, type CommandRunner } from '../utils/process.js';

export interface GitIdentity {
  name: string;
  email: string;
}

export interface DiffStat {
  added: number;
  removed: number;
  binary: boolean;
}

interface GitCallOptions {
  allowedExitCodes?: number[];
  context?: { kind: 'push' } | { kind: 'checkout'; ref: string; path: string };
}

const PUSH_REJECTED_PATTERNS = [/\[rejected\]/, /non-fast-forward/i, /failed to push some refs/i, /\[remote rejected\]/];
const PATH_NOT_FOUND_PATTERNS = [/did not match any file\(s\) known to git/i, /pathspec .* did not match/i];
const AUTH_FAILED_PATTERNS = [/authentication failed/i, /could not read username/i, /permission denied \(publickey\)/i];

function isSpawnNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class GitClient {
  constructor(private readonly run: CommandRunner = runCommand) {}

  // ── Working copy ──

  async isRepository(dir: string): Promise<boolean> {
    if (!existsSync(dir)) return false;
    const res = await this.git(dir, ['rev-parse', '--is-inside-work-tree'], { allowedExitCodes: [128] });
    return res.exitCode === 0 && res.stdout.trim() === 'true';
  }

  async clone(url: string, dir: string): Promise<void> {
    await this.git(undefined, ['clone', url, dir]);
  }

  async pullFastForward(dir: string): Promise<void> {
    await this.git(dir, ['pull', '--ff-only']);
  }

  /** Repository-local identity, so the host's global config is left alone. */
  async configureIdentity(dir: string, identity: GitIdentity): Promise<void> {
    await this.git(dir, ['config', 'user.email', identity.email]);
    await this.git(dir, ['config', 'user.name', identity.name]);
  }

  async headSha(dir: string): Promise<string> {
    const res = await this.git(dir, ['rev-parse', 'HEAD']);
    return res.stdout.trim();
  }

  async currentBranch(dir: string): Promise<string> {
    const res = await this.git(dir, ['rev-parse', '--abbrev-ref', 'HEAD']);
    return res.stdout.trim();
  }

  // ── Remotes ──

  /**
   * Add `name` pointing at `url`, or repoint it when a previous run left it
   * at another URL.
   * @returns what was done to the remote
   */
  async ensureRemote(dir: string, name: string, url: string): Promise<'added' | 'updated' | 'unchanged'> {
    // `remote get-url` exits 2 for an unknown remote (128 on older git)
    const existing = await this.git(dir, ['remote', 'get-url', name], { allowedExitCodes: [2, 128] });
    if (existing.exitCode !== 0) {
      await this.git(dir, ['remote', 'add', name, url]);
      return 'added';
    }
    if (existing.stdout.trim() === url) return 'unchanged';
    await this.git(dir, ['remote', 'set-url', name, url]);
    return 'updated';
  }

  async fetch(dir: string, remote: string, branch: string): Promise<void> {
    await this.git(dir, ['fetch', remote, branch]);
  }

  /** @returns the head commit of `branch` at `url`, or null when the branch does not exist */
  async lsRemote(url: string, branch: string): Promise<string | null> {
    const res = await this.git(undefined, ['ls-remote', '--heads', url, branch]);
    const line = res.stdout.split('\n').find((l) => l.endsWith(`refs/heads/${branch}`));
    if (!line) return null;
    const [sha] = line.split('\t');
    return sha ?? null;
  }

  // ── Paths ──

  /** `git checkout <ref> -- <path>`: updates both the index and the work tree. */
  async checkoutPathFromRef(dir: string, ref: string, path: string): Promise<void> {
    await this.git(dir, ['checkout', ref, '--', path], { context: { kind: 'checkout', ref, path } });
  }

  async add(dir: string, path: string): Promise<void> {
    await this.git(dir, ['add', '--', path]);
  }

  /** Index against HEAD for one path. */
  async hasStagedChanges(dir: string, path: string): Promise<boolean> {
    const res = await this.git(dir, ['diff', '--cached', '--quiet', '--', path], { allowedExitCodes: [1] });
    return res.exitCode === 1;
  }

  async diffStat(dir: string, path: string): Promise<DiffStat> {
    const res = await this.git(dir, ['diff', '--cached', '--numstat', '--', path]);
    const stat: DiffStat = { added: 0, removed: 0, binary: false };
    for (const line of res.stdout.split('\n')) {
      const [added, removed] = line.split('\t');
      if (added === undefined || removed === undefined) continue;
      if (added === '-' || removed === '-') {
        stat.binary = true;
        continue;
      }
      stat.added += Number(added);
      stat.removed += Number(removed);
    }
    return stat;
  }

  /**
   * Commit exactly `path`, leaving anything else staged alone.
   * @returns sha of the new commit
   */
  async commit(dir: string, path: string, subject: string, body?: string): Promise<string> {
    const args = ['commit', '-m', subject];
    if (body) args.push('-m', body);
    args.push('--', path);
    await this.git(dir, args);
    return await this.headSha(dir);
  }

  async push(dir: string, remote: string): Promise<void> {
    await this.git(dir, ['push', remote, 'HEAD'], { context: { kind: 'push' } });
  }

  // ── Plumbing ──

  private async git(cwd: string | undefined, args: string[], opts: GitCallOptions = {}): Promise<CommandResult> {
    try {
      return await this.run('git', args, {
        cwd,
        // Never block on a credential prompt in an unattended run
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        allowedExitCodes: opts.allowedExitCodes
      });
    } catch (err) {
      throw classify(err, args, opts.context);
    }
  }
}

function classify(err: unknown, args: string[], context: GitCallOptions['context']): Error {
  if (isSpawnNotFound(err)) return GitCliError.notAvailable(err);
  if (!(err instanceof CommandError)) return err instanceof Error ? err : new Error(String(err));

  const stderr = err.details.stderr;
  const summary = `git ${args[0] ?? ''}: ${stderr.trim() || err.message}`;

  if (AUTH_FAILED_PATTERNS.some((re) => re.test(stderr))) return GitCliError.authFailed(summary, err);
  if (context?.kind === 'push' && PUSH_REJECTED_PATTERNS.some((re) => re.test(stderr))) {
    return GitCliError.pushRejected(summary, err);
  }
  if (context?.kind === 'checkout' && PATH_NOT_FOUND_PATTERNS.some((re) => re.test(stderr))) {
    return GitCliError.pathNotFound(context.path, context.ref, err);
  }
  return GitCliError.commandFailed(summary, err);
}
