import chalk from 'chalk';
import { SocketError } from '../lib/errors';
import { Logger, isLogLevel } from './logger';
import type { LogLevel } from './logger';

export interface CommonCliOptions {
  port?: string;
  unixPath?: string;
  config?: string;
  logLevel?: string;
}

export function resolveLogLevel(option: string | undefined, fromConfig: LogLevel | undefined): LogLevel {
  if (option !== undefined) {
    if (!isLogLevel(option)) {
      throw new Error(`Invalid log level: ${option}`);
    }
    return option;
  }
  return fromConfig || 'info';
}

/**
 * Print an unhandled failure and end the process with status 1
 */
export function reportFatal(error: unknown, logger: Logger): never {
  if (error instanceof SocketError) {
    console.error(chalk.red(`[FATAL] Error code: ${error.code}`));
    console.error(chalk.red(`[FATAL] Error message: ${error.message}`));
  } else {
    console.error(chalk.red(`[FATAL] ${error instanceof Error ? error.message : String(error)}`));
  }
  logger.debug('Failure detail', error instanceof Error ? error.stack : error);
  process.exit(1);
}
