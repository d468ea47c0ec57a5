import type { Command } from 'commander';
import dotenv from 'dotenv';
import type { Logger } from 'pino';
import { formatConfigErrors, loadConfig } from '../config.js';
import type { RelayConfig } from '../config.js';
import { createLogger } from '../logger.js';

/** Options shared by every command */
export interface GlobalOptions {
  config?: string;
  envFile?: string;
}

export interface CommandContext {
  config: RelayConfig;
  logger: Logger;
}

/**
 * Load `.env`, then the relay configuration. Prints the validation errors
 * and exits on invalid configuration.
 */
export function loadCommandContext(command: Command): CommandContext {
  const globals = command.optsWithGlobals<GlobalOptions>();

  const loaded = dotenv.config({ path: globals.envFile ?? '.env' });
  if (loaded.error && globals.envFile) {
    console.error(`Error: cannot read env file ${globals.envFile}: ${loaded.error.message}`);
    process.exit(1);
  }

  const result = loadConfig({ configPath: globals.config });
  if (!result.success) {
    console.error('Invalid relay configuration:');
    console.error(formatConfigErrors(result.errors));
    process.exit(1);
  }

  const logger = createLogger({ level: result.config.logLevel, nodeEnv: result.config.nodeEnv });
  return { config: result.config, logger };
}
