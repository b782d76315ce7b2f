import { IncludeError, ErrorSeverity } from './IncludeError';

export interface FragmentLoadErrorDetails extends Record<string, unknown> {
  filePath: string;
  fragmentName?: string;
  size?: number;
  maxSize?: number;
}

/**
 * Thrown when a file cannot be registered as a fragment
 */
export class FragmentLoadError extends IncludeError<FragmentLoadErrorDetails> {
  constructor(message: string, details: FragmentLoadErrorDetails, cause?: unknown) {
    super(`Failed to load ${details.filePath}: ${message}`, {
      code: 'FRAGMENT_LOAD_FAILED',
      severity: ErrorSeverity.Fatal,
      details,
      cause
    });

    this.name = 'FragmentLoadError';
    Object.setPrototypeOf(this, FragmentLoadError.prototype);
  }
}
