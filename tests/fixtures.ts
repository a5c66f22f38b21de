/**
 * In-process stand-in for the git binary: answers the commands GitClient
 * issues from an in-memory HEAD/index/upstream model, while the work tree
 * lives in a real temporary directory so the sync code can read and write it.
 */

import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { CommandError } from '../src/errors.js';
import type { SyncConfig } from '../src/scheduler/orchestrator.js';
import type { Logger } from '../src/utils/log.js';
import type { CommandResult, CommandRunner, RunCommandOptions } from '../src/utils/process.js';

export const INITIAL_SHA = '0'.repeat(40);
export const UPSTREAM_URL = 'https://git.example.test/source/epithets';

export interface FakeCommit {
  sha: string;
  subject: string;
  body: string | undefined;
  path: string;
  content: string;
}

export interface RecordedCall {
  command: string;
  args: string[];
  opts: RunCommandOptions;
}

export function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export async function makeTempDir(prefix = 'epithet-sync-test-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

function lineDiff(before: string | undefined, after: string | undefined): { added: number; removed: number } {
  const count = (s: string | undefined) => {
    const m = new Map<string, number>();
    for (const line of (s ?? '').split('\n').filter((l) => l.length > 0)) m.set(line, (m.get(line) ?? 0) + 1);
    return m;
  };
  const a = count(before);
  const b = count(after);
  let added = 0;
  let removed = 0;
  for (const [line, n] of b) added += Math.max(0, n - (a.get(line) ?? 0));
  for (const [line, n] of a) removed += Math.max(0, n - (b.get(line) ?? 0));
  return { added, removed };
}

export class FakeGit {
  readonly calls: RecordedCall[] = [];
  readonly head = new Map<string, string>();
  readonly index = new Map<string, string>();
  /** Files at the tip of the upstream branch */
  readonly upstream = new Map<string, string>();
  readonly remotes = new Map<string, string>();
  readonly config = new Map<string, string>();
  readonly commits: FakeCommit[] = [];
  readonly pushed: string[] = [];
  branch = 'main';
  fetched = false;
  fetchStderr: string | undefined;
  pushStderr: string | undefined;
  /** Handles shell commands (setup and generator) */
  onShell: ((command: string, opts: RunCommandOptions) => Promise<void> | void) | undefined;

  constructor(readonly repoDir: string) {
    this.remotes.set('origin', 'https://git.example.test/data/repo');
  }

  async seedCommitted(file: string, content: string): Promise<void> {
    this.head.set(file, content);
    this.index.set(file, content);
    await fs.writeFile(path.join(this.repoDir, file), content, 'utf8');
  }

  async readWorkTree(file: string): Promise<string | undefined> {
    const full = path.join(this.repoDir, file);
    return existsSync(full) ? await fs.readFile(full, 'utf8') : undefined;
  }

  headSha(): string {
    return this.commits.at(-1)?.sha ?? INITIAL_SHA;
  }

  gitCalls(): string[][] {
    return this.calls.filter((c) => c.command === 'git').map((c) => c.args);
  }

  readonly runner: CommandRunner = async (command, args, opts = {}) => {
    this.calls.push({ command, args, opts });
    if (opts.shell) {
      await this.onShell?.(command, opts);
      return { stdout: '', stderr: '', exitCode: 0 };
    }
    if (command !== 'git') throw new Error(`unexpected command ${command}`);
    return this.finish(args, opts, await this.git(args));
  };

  private finish(args: string[], opts: RunCommandOptions, res: CommandResult): CommandResult {
    if (res.exitCode === 0 || opts.allowedExitCodes?.includes(res.exitCode)) return res;
    const label = `git ${args.join(' ')}`;
    throw new CommandError(`${label} exited with code ${res.exitCode}`, {
      command: label,
      exitCode: res.exitCode,
      signal: null,
      stderr: res.stderr,
      timedOut: false
    });
  }

  private async git(args: string[]): Promise<CommandResult> {
    const ok = (stdout = ''): CommandResult => ({ stdout, stderr: '', exitCode: 0 });
    const fail = (exitCode: number, stderr: string): CommandResult => ({ stdout: '', stderr, exitCode });
    const [cmd, ...rest] = args;
    const file = rest.at(-1) ?? '';

    switch (cmd) {
      case 'rev-parse':
        if (rest[0] === '--is-inside-work-tree') return ok('true\n');
        if (rest[0] === '--abbrev-ref') return ok(`${this.branch}\n`);
        return ok(`${this.headSha()}\n`);
      case 'pull':
        return ok('Already up to date.\n');
      case 'config':
        this.config.set(rest[0] ?? '', rest[1] ?? '');
        return ok();
      case 'remote': {
        const [sub, name = '', url = ''] = rest;
        if (sub === 'get-url') {
          const existing = this.remotes.get(name);
          return existing ? ok(`${existing}\n`) : fail(2, `error: No such remote '${name}'\n`);
        }
        if (sub === 'add' && this.remotes.has(name)) return fail(3, `error: remote ${name} already exists.\n`);
        this.remotes.set(name, url);
        return ok();
      }
      case 'fetch':
        if (this.fetchStderr) return fail(128, this.fetchStderr);
        if (!this.remotes.has(rest[0] ?? '')) return fail(128, `fatal: '${rest[0]}' does not appear to be a git repository\n`);
        this.fetched = true;
        return ok();
      case 'checkout': {
        const content = this.fetched ? this.upstream.get(file) : undefined;
        if (content === undefined) {
          return fail(1, `error: pathspec '${file}' did not match any file(s) known to git\n`);
        }
        await fs.writeFile(path.join(this.repoDir, file), content, 'utf8');
        this.index.set(file, content);
        return ok();
      }
      case 'add': {
        const content = await this.readWorkTree(file);
        if (content === undefined) return fail(128, `fatal: pathspec '${file}' did not match any files\n`);
        this.index.set(file, content);
        return ok();
      }
      case 'diff': {
        const changed = this.index.get(file) !== this.head.get(file);
        if (rest.includes('--quiet')) return changed ? fail(1, '') : ok();
        if (!changed) return ok();
        const { added, removed } = lineDiff(this.head.get(file), this.index.get(file));
        return ok(`${added}\t${removed}\t${file}\n`);
      }
      case 'commit': {
        const subject = rest[1] ?? '';
        const body = rest[2] === '-m' ? rest[3] : undefined;
        const content = this.index.get(file);
        if (content === undefined || content === this.head.get(file)) {
          return fail(1, 'nothing to commit, working tree clean\n');
        }
        this.head.set(file, content);
        const sha = `c${this.commits.length + 1}`.padEnd(40, '0');
        this.commits.push({ sha, subject, body, path: file, content });
        return ok(`[${this.branch} ${sha.slice(0, 7)}] ${subject}\n`);
      }
      case 'push':
        if (this.pushStderr) return fail(1, this.pushStderr);
        this.pushed.push(this.headSha());
        return ok();
      default:
        return fail(129, `unsupported fake git command: ${args.join(' ')}`);
    }
  }
}

export function makeConfig(repoDir: string, overrides: Partial<SyncConfig> = {}): SyncConfig {
  return {
    REPO_DIR: repoDir,
    ORIGIN_REMOTE: 'origin',
    ORIGIN_URL: undefined,
    UPSTREAM_REMOTE: 'upstream',
    UPSTREAM_URL,
    UPSTREAM_BRANCH: 'master',
    EPITHETS_PATH: 'epithets.json',
    ETYMOLOGIES_PATH: 'etymologies.json',
    GENERATOR_COMMAND: './etymology.py',
    GENERATOR_SETUP_COMMAND: undefined,
    GENERATOR_TIMEOUT_SECONDS: 60,
    GIT_USER_NAME: 'Sync Bot',
    GIT_USER_EMAIL: 'no-reply@example.com',
    EPITHET_COMMIT_MESSAGE: 'Automated epithet update from GitHub Action',
    ETYMOLOGY_COMMIT_MESSAGE: 'Automated etymology update from GitHub Action',
    COMMIT_CHANGELOG: true,
    LOCK_TTL_SECONDS: 60,
    LOCK_WAIT_RETRIES: 0,
    ...overrides
  };
}

/** Generator stand-in: writes `content` as etymologies.json into its working directory. */
export function writesEtymologies(content: string) {
  return async (_command: string, opts: RunCommandOptions) => {
    if (!opts.cwd) throw new Error('generator ran without a cwd');
    await fs.writeFile(path.join(opts.cwd, 'etymologies.json'), content, 'utf8');
  };
}
