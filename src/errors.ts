/** Subprocess exited non-zero, was killed, or timed out. */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly details: {
      command: string;
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stderr: string;
      timedOut: boolean;
    }
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export type GitCliErrorCode = 'NOT_AVAILABLE' | 'COMMAND_FAILED' | 'PUSH_REJECTED' | 'PATH_NOT_FOUND' | 'AUTH_FAILED';

export class GitCliError extends Error {
  constructor(
    message: string,
    public readonly code: GitCliErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GitCliError';
  }

  static notAvailable(cause?: unknown): GitCliError {
    return new GitCliError('git executable not found or not runnable', 'NOT_AVAILABLE', { cause });
  }

  static commandFailed(message: string, cause?: unknown): GitCliError {
    return new GitCliError(`git command failed: ${message}`, 'COMMAND_FAILED', { cause });
  }

  static pushRejected(message: string, cause?: unknown): GitCliError {
    return new GitCliError(`push rejected: ${message}`, 'PUSH_REJECTED', { cause });
  }

  static pathNotFound(path: string, ref: string, cause?: unknown): GitCliError {
    return new GitCliError(`path '${path}' not found in ${ref}`, 'PATH_NOT_FOUND', { cause });
  }

  static authFailed(message: string, cause?: unknown): GitCliError {
    return new GitCliError(`authentication failed: ${message}`, 'AUTH_FAILED', { cause });
  }
}

/** Generated output is missing or does not look like the data file it replaces. */
export class GeneratorOutputError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'GeneratorOutputError';
  }
}

export class LeaseUnavailableError extends Error {
  constructor(public readonly key: string) {
    super(`Branch lease '${key}' is held by another run`);
    this.name = 'LeaseUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
