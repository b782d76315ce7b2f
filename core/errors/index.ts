/**
 * Central export point for fragmerge error types.
 */
import type { MissingDependencyError } from './MissingDependencyError';
import type { AmbiguousRootError } from './AmbiguousRootError';
import type { CyclicDependencyError } from './CyclicDependencyError';

export { IncludeError, ErrorSeverity } from './IncludeError';
export type { BaseErrorDetails, IncludeErrorOptions } from './IncludeError';
export { MissingDependencyError } from './MissingDependencyError';
export type { MissingDependencyDetails } from './MissingDependencyError';
export { AmbiguousRootError } from './AmbiguousRootError';
export type { AmbiguousRootDetails } from './AmbiguousRootError';
export { CyclicDependencyError } from './CyclicDependencyError';
export type { CyclicDependencyDetails } from './CyclicDependencyError';
export { FragmentLoadError } from './FragmentLoadError';
export type { FragmentLoadErrorDetails } from './FragmentLoadError';
export { ConfigError } from './ConfigError';
export type { ConfigErrorDetails } from './ConfigError';

/**
 * Union of the errors a merge can fail with.
 */
export type MergeError =
  | MissingDependencyError
  | AmbiguousRootError
  | CyclicDependencyError;
