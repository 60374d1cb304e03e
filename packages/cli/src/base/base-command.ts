/**
 * Base Command Class for the app-commit CLI
 *
 * Provides common output and error handling across commands and applies
 * the --verbose/--quiet flags to core logging.
 */

import { Command } from 'commander';
import { Logger } from '@app-commit/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Maps output flags to the core log level
   */
  protected applyLogLevel(options: TOptions): void {
    if (options.verbose) {
      Logger.setLogLevel('debug');
    } else if (options.quiet || options.json) {
      Logger.setLogLevel('silent');
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: object, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !isQuiet) {
      console.log(`✅ ${message}`);
    }
  }
}
