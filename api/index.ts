/**
 * fragmerge API Entry Point
 *
 * Flattens `#include <name>` directives across named fragments.
 */
/// <reference types="node" />
import { IncludeEngine, type IncludeEngineOptions } from '@services/IncludeEngine/IncludeEngine';
import { FragmentLoader, type FragmentLoaderOptions } from '@services/FragmentLoader/FragmentLoader';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';

export { IncludeEngine, FragmentLoader, NodeFileSystem };
export type { IncludeEngineOptions, FragmentLoaderOptions, IFileSystemService };
export type { IIncludeEngine } from '@services/IncludeEngine/IIncludeEngine';
export { DirectiveScanner, splitLines } from '@services/DirectiveScanner/DirectiveScanner';
export { GraphBuilder } from '@services/GraphBuilder/GraphBuilder';
export { TopologicalOrderer } from '@services/TopologicalOrderer/TopologicalOrderer';
export { SubstitutionEngine } from '@services/SubstitutionEngine/SubstitutionEngine';
export * from '@core/errors';
export * from '@core/types';

/**
 * Options for merging files from disk
 */
export interface MergeFilesOptions extends IncludeEngineOptions, FragmentLoaderOptions {
  /** Custom file system implementation */
  fileSystem?: IFileSystemService;
}

/**
 * Register the given files under their base names and merge them.
 *
 * @example
 * const source = await mergeFiles(['shaders/main.frag', 'shaders/lighting.glsl']);
 */
export async function mergeFiles(filePaths: readonly string[], options: MergeFilesOptions = {}): Promise<string> {
  const engine = new IncludeEngine({ skipBlockComments: options.skipBlockComments });
  const loader = new FragmentLoader(options.fileSystem ?? new NodeFileSystem(), options);

  await loader.loadFiles(engine, filePaths);
  return engine.merge();
}
