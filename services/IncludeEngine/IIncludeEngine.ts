import type { ProcessingOrder, Result } from '@core/types';
import type { MergeError } from '@core/errors';

/**
 * Registry of named fragments plus the merge pipeline that flattens them.
 */
export interface IIncludeEngine {
  /**
   * Register a fragment, replacing any fragment already registered under `name`.
   * Content is not validated until merge time.
   */
  add(name: string, content: string): void;

  /**
   * Deregister a fragment.
   * @returns Whether a fragment was registered under `name`
   */
  remove(name: string): boolean;

  /**
   * Raw registered content, or undefined when `name` is not registered.
   */
  get(name: string): string | undefined;

  has(name: string): boolean;

  /** Registered names in registration order */
  names(): string[];

  clear(): void;

  /**
   * Merge all registered fragments into the root's flattened text.
   * @throws {MissingDependencyError} A directive names an unregistered fragment
   * @throws {AmbiguousRootError} Not exactly one fragment is left unincluded
   * @throws {CyclicDependencyError} Includes form a cycle
   */
  merge(): string;

  /** Alias of merge() */
  build(): string;

  /**
   * Like merge(), but reports taxonomy errors as a failed result.
   */
  tryMerge(): Result<string, MergeError>;

  /**
   * Validate the fragment set and return the order merge() would process it in.
   */
  resolveOrder(): ProcessingOrder;
}
