import { readRunnerConfig } from './config.js';
import { loadEnvFiles } from './env.js';
import { createRunnerLogger } from './observability/logger.js';
import { runDataset } from './run.js';
import { resolveSources } from './sources/catalog.js';

loadEnvFiles();

async function run(): Promise<number> {
  const logger = createRunnerLogger();
  const config = readRunnerConfig();
  const sources = resolveSources(config.sourceIds);

  const { exitCode } = await runDataset({ logger, config, sources });
  return exitCode;
}

run()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const logger = createRunnerLogger();
    logger.error(
      {
        event: 'runner_fatal_error',
        error,
      },
      'Runner fatal error',
    );
    process.exitCode = 1;
  });
