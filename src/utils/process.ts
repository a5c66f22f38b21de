import { spawn } from 'node:child_process';
import { CommandError } from '../errors.js';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Run `command` through the system shell; `args` are then ignored. */
  shell?: boolean;
  /** Exit codes besides 0 that resolve instead of rejecting. */
  allowedExitCodes?: number[];
  /** Forward child output to this process while still collecting it. */
  inheritOutput?: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args: string[], opts?: RunCommandOptions) => Promise<CommandResult>;

const STDERR_TAIL_CHARS = 4000;

function describe(command: string, args: string[], shell: boolean): string {
  return shell || args.length === 0 ? command : `${command} ${args.join(' ')}`;
}

/**
 * Spawn `command` and collect its output. With `timeoutMs`, the child leads
 * its own process group and the whole group is killed on expiry, so a shell
 * cannot leave the real work running behind it.
 */
export const runCommand: CommandRunner = (command, args, opts = {}) => {
  const shell = opts.shell ?? false;
  const label = describe(command, args, shell);
  const useGroup = opts.timeoutMs != null && process.platform !== 'win32';

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, shell ? [] : args, {
      cwd: opts.cwd,
      env: opts.env ?? process.env,
      shell,
      detached: useGroup,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const killTree = () => {
      if (!useGroup || child.pid == null) {
        child.kill('SIGKILL');
        return;
      }
      try {
        process.kill(-child.pid, 'SIGKILL');
      } catch {
        child.kill('SIGKILL');
      }
    };

    const timer =
      opts.timeoutMs != null
        ? setTimeout(() => {
            timedOut = true;
            killTree();
            // A process that left the group may still hold the pipes
            child.stdout.destroy();
            child.stderr.destroy();
          }, opts.timeoutMs)
        : undefined;

    child.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk);
      if (opts.inheritOutput) process.stdout.write(chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
      if (opts.inheritOutput) process.stderr.write(chunk);
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on('close', (code, signal) => {
      clearTimeout(timer);
      const out = Buffer.concat(stdout).toString('utf8');
      const err = Buffer.concat(stderr).toString('utf8');

      if (!timedOut && code != null && (code === 0 || opts.allowedExitCodes?.includes(code))) {
        resolve({ stdout: out, stderr: err, exitCode: code });
        return;
      }

      const reason = timedOut
        ? `timed out after ${opts.timeoutMs}ms`
        : code != null
          ? `exited with code ${code}`
          : `killed by ${signal ?? 'unknown signal'}`;
      reject(
        new CommandError(`${label} ${reason}`, {
          command: label,
          exitCode: code,
          signal,
          stderr: err.slice(-STDERR_TAIL_CHARS),
          timedOut
        })
      );
    });
  });
};
