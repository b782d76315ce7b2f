import { IncludeError, ErrorSeverity } from './IncludeError';

export interface MissingDependencyDetails extends Record<string, unknown> {
  /** The unregistered name a directive refers to */
  name: string;
  /** The fragment holding the directive */
  includedBy: string;
}

/**
 * Thrown when an include directive references a fragment that was never registered.
 */
export class MissingDependencyError extends IncludeError<MissingDependencyDetails> {
  public readonly kind = 'MissingDependency' as const;
  public readonly missingName: string;
  public readonly includedBy: string;

  constructor(name: string, includedBy: string) {
    super(`Cannot include missing fragment "${name}" (referenced by "${includedBy}")`, {
      code: 'MISSING_DEPENDENCY',
      severity: ErrorSeverity.Fatal,
      details: { name, includedBy }
    });

    this.name = 'MissingDependencyError';
    this.missingName = name;
    this.includedBy = includedBy;

    Object.setPrototypeOf(this, MissingDependencyError.prototype);
  }
}
