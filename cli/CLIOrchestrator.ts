import { version } from '@core/version';
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { IncludeError, ErrorSeverity } from '@core/errors/IncludeError';
import { cliLogger as logger, setLogLevel } from '@core/utils/logger';
import { IncludeEngine } from '@services/IncludeEngine/IncludeEngine';
import { FragmentLoader } from '@services/FragmentLoader/FragmentLoader';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import type { CLIOptions } from './index';
import { ErrorHandler } from './error/ErrorHandler';
import { HelpSystem } from './interaction/HelpSystem';
import { ArgumentParser } from './parsers/ArgumentParser';

export interface CLIDependencies {
  fileSystem?: IFileSystemService;
  /** Resolved configuration; read from the config files when omitted */
  config?: ResolvedConfig;
  /** Sink for merged output written to stdout */
  write?: (text: string) => void;
}

export class CLIOrchestrator {
  private readonly errorHandler = new ErrorHandler();
  private readonly helpSystem = new HelpSystem();
  private readonly argumentParser = new ArgumentParser();
  private readonly fileSystem: IFileSystemService;
  private readonly write: (text: string) => void;

  constructor(private readonly deps: CLIDependencies = {}) {
    this.fileSystem = deps.fileSystem ?? new NodeFileSystem();
    this.write = deps.write ?? (text => {
      process.stdout.write(text);
    });
  }

  /**
   * Run one CLI invocation.
   * @returns The exit code
   */
  async main(customArgs?: string[]): Promise<number> {
    let cliOptions: CLIOptions = { inputs: [] };

    try {
      const args = customArgs ?? process.argv.slice(2);
      cliOptions = this.argumentParser.parseArgs(args);

      if (cliOptions.version) {
        console.log(`fragmerge version ${version}`);
        return 0;
      }

      if (cliOptions.help) {
        this.helpSystem.displayHelp();
        return 0;
      }

      if (cliOptions.inputs.length === 0) {
        throw new IncludeError('No input files or directories given', {
          code: 'INVALID_ARGUMENTS',
          severity: ErrorSeverity.Fatal
        });
      }

      this.configureLogging(cliOptions);
      await this.run(cliOptions);
      return 0;
    } catch (error: unknown) {
      return this.errorHandler.handleError(error, cliOptions);
    }
  }

  private async run(cliOptions: CLIOptions): Promise<void> {
    const config = this.deps.config ?? new ConfigLoader().load();
    const engine = new IncludeEngine({
      skipBlockComments: cliOptions.skipBlockComments ?? config.skipBlockComments
    });
    const loader = new FragmentLoader(this.fileSystem, {
      extensions: cliOptions.extensions ?? config.extensions,
      maxFragmentSize: config.maxFragmentSize
    });

    for (const input of cliOptions.inputs) {
      if (await this.fileSystem.isDirectory(input)) {
        await loader.loadDirectory(engine, input);
      } else {
        await loader.loadFiles(engine, [input]);
      }
    }
    logger.info(`Loaded ${engine.names().length} fragments`);

    if (cliOptions.order) {
      const { order } = engine.resolveOrder();
      this.write(order.join('\n') + '\n');
      return;
    }

    const merged = engine.merge();
    const output = cliOptions.output ?? config.output;

    if (output) {
      await this.fileSystem.writeFile(output, merged);
      logger.info(`Wrote merged source to ${output}`);
    } else {
      this.write(merged);
    }
  }

  private configureLogging(cliOptions: CLIOptions): void {
    if (cliOptions.debug) {
      process.env.FRAGMERGE_DEBUG = 'true';
      setLogLevel('debug');
    } else if (cliOptions.verbose) {
      setLogLevel('info');
    }
  }
}
