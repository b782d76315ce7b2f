import { IncludeError, ErrorSeverity } from './IncludeError';

export interface ConfigErrorDetails extends Record<string, unknown> {
  filePath: string;
  field: string;
}

export class ConfigError extends IncludeError<ConfigErrorDetails> {
  constructor(message: string, details: ConfigErrorDetails) {
    super(`Invalid configuration in ${details.filePath}: ${message}`, {
      code: 'INVALID_CONFIG',
      severity: ErrorSeverity.Fatal,
      details
    });

    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
