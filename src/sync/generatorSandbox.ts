import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { GeneratorOutputError } from '../errors.js';
import type { CommandRunner } from '../utils/process.js';
import type { Logger } from '../utils/log.js';

// The file is opaque here: only its outermost shape is checked.
const generatedDocumentSchema = z.union([
  z.array(z.unknown()).nonempty({ message: 'top-level array is empty' }),
  z.record(z.unknown()).refine((o) => Object.keys(o).length > 0, { message: 'top-level object is empty' })
]);

export function validateGeneratedJson(raw: string, file: string): void {
  if (raw.trim().length === 0) {
    throw new GeneratorOutputError(`${file} is empty`, file);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new GeneratorOutputError(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, file);
  }

  const result = generatedDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const reason = result.error.issues.map((i) => i.message).join('; ');
    throw new GeneratorOutputError(`${file} is not a non-empty JSON object or array: ${reason}`, file);
  }
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * The generator runs from a temporary directory, so every word that starts
 * with `./` or `../` (`./etymology.py`, `python3 ./etymology.py`) is pinned
 * to the working copy. Bare relative names such as `etymology.py` are not
 * rewritten and resolve against the temporary directory.
 */
export function resolveGeneratorCommand(command: string, repoDir: string): string {
  return command
    .trim()
    .split(/(\s+)/)
    .map((word) => (word.startsWith('./') || word.startsWith('../') ? shellQuote(path.resolve(repoDir, word)) : word))
    .join('');
}

export interface ScopedGeneratorArgs {
  run: CommandRunner;
  logger: Logger;
  repoDir: string;
  command: string;
  /** Paths relative to the working copy that the generator reads */
  inputs: string[];
  /** Path relative to the working copy that the generator writes */
  output: string;
  timeoutMs: number;
}

async function copyIfPresent(from: string, to: string): Promise<boolean> {
  if (!existsSync(from)) return false;
  await fs.mkdir(path.dirname(to), { recursive: true });
  await fs.copyFile(from, to);
  return true;
}

/**
 * Run the generator against copies of its inputs in a throwaway directory,
 * validate what it wrote there and only then promote it over the working
 * copy's file. The directory is removed whatever happens.
 *
 * @returns size in bytes of the promoted file
 */
export async function runGeneratorScoped(args: ScopedGeneratorArgs): Promise<number> {
  const { logger, repoDir } = args;
  const scratch = await fs.mkdtemp(path.join(os.tmpdir(), 'epithet-sync-'));

  try {
    // The previous output goes in too: generators may only fill in what is missing
    for (const rel of [...args.inputs, args.output]) {
      const copied = await copyIfPresent(path.join(repoDir, rel), path.join(scratch, rel));
      if (copied) logger.info(`   → Staged ${rel} in scratch directory`);
    }

    const command = resolveGeneratorCommand(args.command, repoDir);
    logger.info(`⚙️  Running generator: ${command}`);
    await args.run(command, [], { shell: true, cwd: scratch, timeoutMs: args.timeoutMs, inheritOutput: true });

    const produced = path.join(scratch, args.output);
    if (!existsSync(produced)) {
      throw new GeneratorOutputError(`generator did not write ${args.output}`, args.output);
    }

    const bytes = await fs.readFile(produced);
    validateGeneratedJson(bytes.toString('utf8'), args.output);

    const target = path.join(repoDir, args.output);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, bytes);
    logger.info(`   ✓ Promoted ${args.output} (${bytes.length} bytes)`);
    return bytes.length;
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
  }
}
