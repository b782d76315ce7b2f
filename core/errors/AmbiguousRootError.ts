import { IncludeError, ErrorSeverity } from './IncludeError';

export interface AmbiguousRootDetails extends Record<string, unknown> {
  /** Fragments no other fragment includes */
  candidates: string[];
}

/**
 * Thrown when the fragment set does not have exactly one fragment that nothing includes.
 */
export class AmbiguousRootError extends IncludeError<AmbiguousRootDetails> {
  public readonly kind = 'AmbiguousRoot' as const;
  public readonly candidates: string[];

  constructor(candidates: string[]) {
    const found = candidates.length === 0
      ? 'none found'
      : `found ${candidates.length}: ${candidates.join(', ')}`;

    super(`There must be exactly 1 fragment which is not included by any other fragment (${found})`, {
      code: 'AMBIGUOUS_ROOT',
      severity: ErrorSeverity.Fatal,
      details: { candidates: [...candidates] }
    });

    this.name = 'AmbiguousRootError';
    this.candidates = [...candidates];

    Object.setPrototypeOf(this, AmbiguousRootError.prototype);
  }
}
