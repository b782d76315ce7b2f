import { CLIOrchestrator } from './CLIOrchestrator';

// CLI Options interface
export interface CLIOptions {
  /** Files and directories to load fragments from */
  inputs: string[];
  output?: string;
  /** Extensions overriding the configured ones when loading directories */
  extensions?: string[];
  skipBlockComments?: boolean;
  /** Print the processing order instead of merging */
  order?: boolean;
  verbose?: boolean;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(customArgs?: string[]): Promise<number> {
  const orchestrator = new CLIOrchestrator();
  return orchestrator.main(customArgs);
}
