import { IncludeError, ErrorSeverity } from './IncludeError';

export interface CyclicDependencyDetails extends Record<string, unknown> {
  /** Fragments left with unresolved includes once ordering stalls */
  unresolved: string[];
}

/**
 * Thrown when fragments remain unordered because they sit on or behind an include cycle.
 */
export class CyclicDependencyError extends IncludeError<CyclicDependencyDetails> {
  public readonly kind = 'CyclicDependency' as const;
  public readonly unresolved: string[];

  constructor(unresolved: string[]) {
    super(`Cyclic dependency detected between: ${unresolved.join(', ')}`, {
      code: 'CYCLIC_DEPENDENCY',
      severity: ErrorSeverity.Fatal,
      details: { unresolved: [...unresolved] }
    });

    this.name = 'CyclicDependencyError';
    this.unresolved = [...unresolved];

    Object.setPrototypeOf(this, CyclicDependencyError.prototype);
  }
}
