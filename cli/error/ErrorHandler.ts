import chalk from 'chalk';
import { IncludeError, ErrorSeverity } from '@core/errors/IncludeError';
import { MissingDependencyError } from '@core/errors/MissingDependencyError';
import { AmbiguousRootError } from '@core/errors/AmbiguousRootError';
import { CyclicDependencyError } from '@core/errors/CyclicDependencyError';
import { cliLogger as logger } from '@core/utils/logger';
import type { CLIOptions } from '../index';

export class ErrorHandler {
  /**
   * Report an error and return the exit code it maps to.
   */
  handleError(error: unknown, options: CLIOptions): number {
    if (error instanceof IncludeError) {
      return this.handleIncludeError(error, options);
    }

    if (error instanceof Error) {
      logger.error('Unexpected error', { error: error.message, stack: error.stack });
      console.error(chalk.red(`Error: ${error.message}`));
      if (options.debug && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      return 1;
    }

    console.error(chalk.red(`Error: ${String(error)}`));
    return 1;
  }

  private handleIncludeError(error: IncludeError, options: CLIOptions): number {
    logger.error(error.message, { code: error.code, details: error.details });

    const title = error.canBeWarning() ? chalk.yellow(`[${error.code}]`) : chalk.red(`[${error.code}]`);
    console.error(`${title} ${error.message}`);

    const hint = this.hintFor(error);
    if (hint) {
      console.error(chalk.gray(hint));
    }

    if (options.debug && error.details) {
      console.error(chalk.gray(JSON.stringify(error.details, null, 2)));
    }

    return error.severity === ErrorSeverity.Fatal ? 1 : 0;
  }

  private hintFor(error: IncludeError): string | undefined {
    if (error instanceof MissingDependencyError) {
      return `Pass the file that provides "${error.missingName}" or fix the #include in "${error.includedBy}".`;
    }
    if (error instanceof AmbiguousRootError) {
      return error.candidates.length === 0
        ? 'Every fragment is included by another one, so the includes form a cycle.'
        : 'Only the top-level fragment may be left unincluded; drop the extra inputs.';
    }
    if (error instanceof CyclicDependencyError) {
      return 'Fragments cannot include each other in a loop; #pragma once does not break cycles.';
    }
    if (error.code === 'INVALID_ARGUMENTS') {
      return 'Run fragmerge --help for usage.';
    }
    return undefined;
  }
}
