/**
 * Configuration types for fragmerge
 */

export interface FragmergeConfig {
  /** File extensions picked up when loading a directory, e.g. ".frag" */
  extensions?: string[];
  /** Ignore directives on lines that start inside a block comment */
  skipBlockComments?: boolean;
  /** Largest fragment accepted, e.g. "512KB" or a byte count */
  maxFragmentSize?: string | number;
  /** Default output path for the CLI */
  output?: string;
}

// Runtime configuration after parsing and merging
export interface ResolvedConfig {
  extensions: string[];
  skipBlockComments: boolean;
  maxFragmentSize: number;
  output?: string;
}

export const DEFAULT_EXTENSIONS = [
  '.glsl',
  '.vert',
  '.frag',
  '.comp',
  '.geom',
  '.tesc',
  '.tese',
  '.wgsl'
] as const;

export const DEFAULT_MAX_FRAGMENT_SIZE = '1MB';
