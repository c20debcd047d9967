/**
 * Base command for framedeck
 *
 * Carries the logging flags every command accepts and the shared failure output.
 */

import { createLogger, type Logger, isFramedeckError } from '@framedeck/core';
import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';

export interface LoggingFlags {
  'log-file'?: string;
  verbosity: number;
}

export abstract class BaseCommand extends Command {
  static baseFlags = {
    'log-file': Flags.string({
      char: 'l',
      description: 'Also append log lines to this file',
    }),
    verbosity: Flags.integer({
      char: 'v',
      description: 'Log verbosity (0 = warnings, 1 = info, 2 = debug)',
      default: 0,
      min: 0,
    }),
  };

  protected createLogger(flags: LoggingFlags): Logger {
    return createLogger({
      verbosity: flags.verbosity,
      logFile: flags['log-file'],
      scope: this.id ?? 'framedeck',
    });
  }

  /**
   * Report a failed operation and exit with status 1
   */
  protected reportFailure(summary: string, error: unknown): never {
    const message = error instanceof Error ? error.message : String(error);

    this.log('');
    this.log(chalk.red(`✗ ${summary}`));
    if (isFramedeckError(error)) {
      this.log(chalk.dim(`  ${error.code}: ${message}`));
    } else {
      this.log(chalk.dim(`  ${message}`));
    }
    this.log('');
    this.exit(1);
  }
}
