import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CommandError, GeneratorOutputError } from '../src/errors.js';
import { resolveGeneratorCommand, runGeneratorScoped, validateGeneratedJson } from '../src/sync/generatorSandbox.js';
import type { CommandRunner } from '../src/utils/process.js';
import { makeTempDir, silentLogger } from './fixtures.js';

describe('validateGeneratedJson', () => {
  it('accepts a non-empty object or array', () => {
    expect(() => validateGeneratedJson('{"etymologies":{"iso":null}}', 'etymologies.json')).not.toThrow();
    expect(() => validateGeneratedJson('[1]', 'etymologies.json')).not.toThrow();
  });

  it('rejects an empty file', () => {
    expect(() => validateGeneratedJson('  \n', 'etymologies.json')).toThrow('etymologies.json is empty');
  });

  it('rejects malformed JSON', () => {
    expect(() => validateGeneratedJson('{"etymologies":', 'etymologies.json')).toThrow(
      /^etymologies\.json is not valid JSON: /
    );
  });

  it('rejects an empty object or array', () => {
    expect(() => validateGeneratedJson('{}', 'etymologies.json')).toThrow(
      'etymologies.json is not a non-empty JSON object or array: top-level object is empty'
    );
    expect(() => validateGeneratedJson('[]', 'etymologies.json')).toThrow(
      'etymologies.json is not a non-empty JSON object or array: top-level array is empty'
    );
  });

  it('rejects a scalar document', () => {
    expect(() => validateGeneratedJson('42', 'etymologies.json')).toThrow(GeneratorOutputError);
  });
});

describe('resolveGeneratorCommand', () => {
  it('pins a relative executable to the working copy', () => {
    expect(resolveGeneratorCommand('./etymology.py', '/srv/data')).toBe("'/srv/data/etymology.py'");
    expect(resolveGeneratorCommand('./bin/gen --fast', '/srv/data')).toBe("'/srv/data/bin/gen' --fast");
  });

  it('quotes single quotes in the resolved path', () => {
    expect(resolveGeneratorCommand("../it's/gen", '/srv/data/repo')).toBe("'/srv/data/it'\\''s/gen'");
  });

  it('pins a relative script passed to an interpreter', () => {
    expect(resolveGeneratorCommand('python3 ./etymology.py --out etymologies.json', '/srv/data')).toBe(
      "python3 '/srv/data/etymology.py' --out etymologies.json"
    );
  });

  it('leaves commands found on PATH alone', () => {
    expect(resolveGeneratorCommand('python3 etymology.py', '/srv/data')).toBe('python3 etymology.py');
  });
});

describe('runGeneratorScoped', () => {
  let repoDir: string;

  beforeEach(async () => {
    repoDir = await makeTempDir();
    await fs.writeFile(path.join(repoDir, 'epithets.json'), '{"epithets":["iso"]}', 'utf8');
    await fs.writeFile(path.join(repoDir, 'etymologies.json'), '{"etymologies":{"old":null}}', 'utf8');
  });

  afterEach(async () => {
    await fs.rm(repoDir, { recursive: true, force: true });
  });

  function args(run: CommandRunner) {
    return {
      run,
      logger: silentLogger(),
      repoDir,
      command: './etymology.py',
      inputs: ['epithets.json'],
      output: 'etymologies.json',
      timeoutMs: 5000
    };
  }

  it('runs against copies in a scratch directory and promotes the validated output', async () => {
    const seen: { cwd?: string; epithets?: string; previous?: string } = {};
    const run = vi.fn<CommandRunner>(async (_command, _args, opts = {}) => {
      const cwd = opts.cwd ?? '';
      seen.cwd = cwd;
      seen.epithets = await fs.readFile(path.join(cwd, 'epithets.json'), 'utf8');
      seen.previous = await fs.readFile(path.join(cwd, 'etymologies.json'), 'utf8');
      await fs.writeFile(path.join(cwd, 'etymologies.json'), '{"etymologies":{"iso":null}}', 'utf8');
      return { stdout: '', stderr: '', exitCode: 0 };
    });

    const bytes = await runGeneratorScoped(args(run));

    expect(run).toHaveBeenCalledWith(`'${path.join(repoDir, 'etymology.py')}'`, [], {
      shell: true,
      cwd: seen.cwd,
      timeoutMs: 5000,
      inheritOutput: true
    });
    expect(seen.cwd).not.toBe(repoDir);
    expect(seen.epithets).toBe('{"epithets":["iso"]}');
    expect(seen.previous).toBe('{"etymologies":{"old":null}}');
    expect(await fs.readFile(path.join(repoDir, 'etymologies.json'), 'utf8')).toBe('{"etymologies":{"iso":null}}');
    expect(bytes).toBe('{"etymologies":{"iso":null}}'.length);
    expect(existsSync(seen.cwd ?? '')).toBe(false);
  });

  it('keeps the working copy untouched when the output is invalid', async () => {
    let scratch = '';
    const run = vi.fn<CommandRunner>(async (_command, _args, opts = {}) => {
      scratch = opts.cwd ?? '';
      await fs.writeFile(path.join(scratch, 'etymologies.json'), '{}', 'utf8');
      return { stdout: '', stderr: '', exitCode: 0 };
    });

    await expect(runGeneratorScoped(args(run))).rejects.toBeInstanceOf(GeneratorOutputError);

    expect(await fs.readFile(path.join(repoDir, 'etymologies.json'), 'utf8')).toBe('{"etymologies":{"old":null}}');
    expect(existsSync(scratch)).toBe(false);
  });

  it('propagates a failing generator and cleans up', async () => {
    let scratch = '';
    const run = vi.fn<CommandRunner>(async (_command, _args, opts = {}) => {
      scratch = opts.cwd ?? '';
      await fs.writeFile(path.join(scratch, 'etymologies.json'), 'partial', 'utf8');
      throw new CommandError('etymology.py exited with code 1', {
        command: 'etymology.py',
        exitCode: 1,
        signal: null,
        stderr: 'Traceback',
        timedOut: false
      });
    });

    await expect(runGeneratorScoped(args(run))).rejects.toBeInstanceOf(CommandError);

    expect(await fs.readFile(path.join(repoDir, 'etymologies.json'), 'utf8')).toBe('{"etymologies":{"old":null}}');
    expect(existsSync(scratch)).toBe(false);
  });

  it('fails when the generator writes nothing', async () => {
    await fs.rm(path.join(repoDir, 'etymologies.json'));
    const run = vi.fn<CommandRunner>(async () => ({ stdout: '', stderr: '', exitCode: 0 }));

    await expect(runGeneratorScoped(args(run))).rejects.toThrow('generator did not write etymologies.json');
    expect(existsSync(path.join(repoDir, 'etymologies.json'))).toBe(false);
  });
});
