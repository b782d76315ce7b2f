/**
 * A named unit of source text registered with the engine.
 */
export interface Fragment {
  readonly name: string;
  readonly content: string;
}

/**
 * Line terminator recorded for a scanned line. The last line of a fragment
 * may have none.
 */
export type LineEnding = '\n' | '\r\n' | '';

export interface SourceLine {
  /** Line text without its terminator */
  text: string;
  eol: LineEnding;
}

export interface IncludeDirective {
  kind: 'include';
  /** Referenced fragment name, without the angle brackets */
  name: string;
  /** Zero-based line index in the fragment content */
  line: number;
  /** Text after the closing bracket, trimmed; empty when there is none */
  trailing: string;
}

export interface PragmaOnceDirective {
  kind: 'pragma-once';
  line: number;
  trailing: string;
}

export type Directive = IncludeDirective | PragmaOnceDirective;

export interface ScanOptions {
  /**
   * Treat lines that start inside a block comment as plain text. Off by
   * default: detection is purely line-anchored.
   */
  skipBlockComments?: boolean;
}

export interface ScanResult {
  /** Unique referenced names, in order of first appearance */
  includes: string[];
  /** Whether the fragment declares `#pragma once` */
  includeOnce: boolean;
  /** Every directive occurrence, duplicates included */
  directives: Directive[];
  lines: SourceLine[];
}

export interface DependencyGraph {
  /** Fragment names in registration order */
  nodes: string[];
  /** fragment -> names it includes */
  outEdges: Map<string, Set<string>>;
  /** fragment -> names that include it */
  inEdges: Map<string, Set<string>>;
  outDegree: Map<string, number>;
  inDegree: Map<string, number>;
}

export interface ProcessingOrder {
  /** The only fragment nothing includes */
  root: string;
  /** Dependencies before dependents; the root comes last */
  order: string[];
}
