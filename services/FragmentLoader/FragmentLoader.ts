import * as path from 'path';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import type { IIncludeEngine } from '@services/IncludeEngine/IIncludeEngine';
import { FRAGMENT_NAME_PATTERN } from '@services/DirectiveScanner/DirectiveScanner';
import { FragmentLoadError } from '@core/errors/FragmentLoadError';
import { parseSize, formatSize, normalizeExtension } from '@core/config/utils';
import { DEFAULT_EXTENSIONS, DEFAULT_MAX_FRAGMENT_SIZE } from '@core/config/types';
import { loaderLogger as logger } from '@core/utils/logger';

export interface FragmentLoaderOptions {
  /** Extensions accepted by loadDirectory() */
  extensions?: readonly string[];
  /** Largest accepted file, in bytes or as a size string */
  maxFragmentSize?: number | string;
}

/**
 * Reads files and registers them with an engine under their base names.
 */
export class FragmentLoader {
  private readonly extensions: Set<string>;
  private readonly maxFragmentSize: number;

  constructor(
    private readonly fileSystem: IFileSystemService,
    options: FragmentLoaderOptions = {}
  ) {
    this.extensions = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map(normalizeExtension));
    this.maxFragmentSize = parseSize(options.maxFragmentSize ?? DEFAULT_MAX_FRAGMENT_SIZE);
  }

  /**
   * Register each file under its base name, in the order given.
   * @returns The registered fragment names
   */
  async loadFiles(engine: IIncludeEngine, filePaths: readonly string[]): Promise<string[]> {
    const names: string[] = [];
    for (const filePath of filePaths) {
      names.push(await this.loadFile(engine, filePath));
    }
    return names;
  }

  /**
   * Register every file directly inside `dirPath` whose extension is accepted,
   * in sorted name order. Subdirectories are not entered.
   */
  async loadDirectory(engine: IIncludeEngine, dirPath: string): Promise<string[]> {
    const entries = [...await this.fileSystem.readdir(dirPath)].sort();
    const files: string[] = [];

    for (const entry of entries) {
      const filePath = path.join(dirPath, entry);
      if (!this.extensions.has(path.extname(entry).toLowerCase())) {
        continue;
      }
      if (await this.fileSystem.isDirectory(filePath)) {
        continue;
      }
      files.push(filePath);
    }

    logger.debug('Collected fragment files', { dirPath, files });
    return this.loadFiles(engine, files);
  }

  private async loadFile(engine: IIncludeEngine, filePath: string): Promise<string> {
    const name = path.basename(filePath);
    if (!FRAGMENT_NAME_PATTERN.test(name)) {
      throw new FragmentLoadError(
        `"${name}" is not a valid fragment name (allowed: letters, digits, "_" and ".")`,
        { filePath, fragmentName: name }
      );
    }

    let content: string;
    try {
      content = await this.fileSystem.readFile(filePath);
    } catch (error) {
      throw new FragmentLoadError(
        error instanceof Error ? error.message : String(error),
        { filePath, fragmentName: name },
        error
      );
    }

    const size = Buffer.byteLength(content, 'utf8');
    if (size > this.maxFragmentSize) {
      throw new FragmentLoadError(
        `file is ${formatSize(size)}, larger than the ${formatSize(this.maxFragmentSize)} limit`,
        { filePath, fragmentName: name, size, maxSize: this.maxFragmentSize }
      );
    }

    if (engine.has(name)) {
      logger.warn('Fragment registered twice, keeping the later file', { name, filePath });
    }
    engine.add(name, content);
    logger.debug('Registered fragment', { name, filePath, size });

    return name;
  }
}
