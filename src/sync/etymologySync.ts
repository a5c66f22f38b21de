import type { GitClient } from '../git/gitClient.js';
import type { SyncOutcome } from '../types.js';
import type { CommandRunner } from '../utils/process.js';
import type { Logger } from '../utils/log.js';
import { commitIfChanged } from './commitIfChanged.js';
import { runGeneratorScoped } from './generatorSandbox.js';

export interface EtymologySyncDeps {
  git: GitClient;
  run: CommandRunner;
  logger: Logger;
  repoDir: string;
  originRemote: string;
  generator: { command: string; setupCommand?: string; timeoutMs: number };
  epithetsPath: string;
  path: string;
  commitMessage: string;
  changelog: boolean;
  now?: () => Date;
}

export async function syncEtymologies(deps: EtymologySyncDeps): Promise<SyncOutcome> {
  const { logger, repoDir, generator } = deps;

  if (generator.setupCommand) {
    logger.info(`📦 Installing generator dependencies: ${generator.setupCommand}`);
    await deps.run(generator.setupCommand, [], { shell: true, cwd: repoDir, inheritOutput: true });
    logger.info('   ✓ Dependencies installed');
  }

  await runGeneratorScoped({
    run: deps.run,
    logger,
    repoDir,
    command: generator.command,
    inputs: [deps.epithetsPath],
    output: deps.path,
    timeoutMs: generator.timeoutMs
  });

  return await commitIfChanged({
    git: deps.git,
    logger,
    repoDir,
    originRemote: deps.originRemote,
    target: 'etymologies',
    path: deps.path,
    message: deps.commitMessage,
    source: generator.command,
    changelog: deps.changelog,
    now: deps.now
  });
}
