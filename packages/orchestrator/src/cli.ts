import chalk from 'chalk';
import { createLogger, errorMessage, loadConfig } from '@threadcast/shared';
import { createPipeline } from './pipeline.js';
import { QueueManager } from './queue.js';
import { runCommand } from './commands.js';

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);
  const config = loadConfig();
  const logger = createLogger('threadcast', config.logLevel);

  try {
    return await runCommand(command, args, {
      config,
      logger,
      out: (line) => console.log(line),
      pipeline: () => createPipeline(config, logger),
      queue: () => new QueueManager({ redisUrl: config.redisUrl, concurrency: config.workerConcurrency }, logger),
      untilShutdown: () =>
        new Promise((resolve) => {
          process.once('SIGINT', () => resolve());
          process.once('SIGTERM', () => resolve());
        }),
    });
  } catch (err) {
    logger.error({ err }, 'Command failed');
    console.error(chalk.red(`\n  ✗ Error: ${errorMessage(err)}`));
    return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(chalk.red(`\n  ✗ Error: ${errorMessage(err)}`));
    process.exit(1);
  },
);
