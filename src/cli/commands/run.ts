import { Command } from 'commander';
import { loadConfig, resolveLogLevel, DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { main } from '../../core/entry/index.js';
import { logger as log } from '../../utils/logger.js';

interface RunOptions {
  config: string;
  verbose?: boolean;
}

/**
 * Create the run command (the program's default).
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Greet Ada and print the computed totals')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--verbose', 'Log each step')
    .action(async (options: RunOptions) => {
      try {
        await runMain(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runMain(options: RunOptions): Promise<void> {
  const config = await loadConfig(process.cwd(), options.config);
  log.setLevel(resolveLogLevel(config, process.env, options.verbose ?? false));
  log.debug('Loaded config', { path: options.config, log_level: log.getLevel() });

  main();
}
