import type { CLIOptions } from '../index';
import { IncludeError, ErrorSeverity } from '@core/errors/IncludeError';

export class ArgumentParser {
  /**
   * @throws {IncludeError} INVALID_ARGUMENTS on an unknown flag or a flag missing its value
   */
  parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = {
      inputs: []
    };

    let optionsEnded = false;

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (optionsEnded || !arg.startsWith('-') || arg === '-') {
        options.inputs.push(arg);
        continue;
      }

      switch (arg) {
        case '--':
          optionsEnded = true;
          break;
        case '--version':
        case '-V':
          options.version = true;
          break;
        case '--help':
        case '-h':
          options.help = true;
          break;
        case '--output':
        case '-o':
          options.output = this.requireValue(args, ++i, arg);
          break;
        case '--ext':
        case '-e':
          options.extensions = this.requireValue(args, ++i, arg)
            .split(',')
            .map(ext => ext.trim())
            .filter(ext => ext.length > 0);
          break;
        case '--skip-block-comments':
          options.skipBlockComments = true;
          break;
        case '--order':
          options.order = true;
          break;
        case '--verbose':
        case '-v':
          options.verbose = true;
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        default:
          throw this.usageError(`Unknown option: ${arg}`);
      }
    }

    return options;
  }

  private requireValue(args: string[], index: number, flag: string): string {
    const value = args[index];
    if (value === undefined || (value.startsWith('-') && value !== '-')) {
      throw this.usageError(`Option ${flag} requires a value`);
    }
    return value;
  }

  private usageError(message: string): IncludeError {
    return new IncludeError(message, {
      code: 'INVALID_ARGUMENTS',
      severity: ErrorSeverity.Fatal
    });
  }
}
