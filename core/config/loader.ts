import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '@core/errors/ConfigError';
import { configLogger as logger } from '@core/utils/logger';
import type { FragmergeConfig, ResolvedConfig } from './types';
import { DEFAULT_EXTENSIONS, DEFAULT_MAX_FRAGMENT_SIZE } from './types';
import { normalizeExtension, parseSize } from './utils';

export const PROJECT_CONFIG_FILE = 'fragmerge.config.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load fragmerge configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: ResolvedConfig;

  constructor(projectPath?: string) {
    // Global config location: ~/.config/fragmerge.json
    this.globalConfigPath = path.join(os.homedir(), '.config', 'fragmerge.json');

    // Project config location: <project>/fragmerge.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), PROJECT_CONFIG_FILE);
  }

  /**
   * Load and merge configurations
   * @throws {ConfigError} When a config file holds a field of the wrong type
   */
  load(): ResolvedConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    this.cachedConfig = this.resolve(this.mergeConfigs(globalConfig, projectConfig));
    logger.debug('Loaded configuration', { config: this.cachedConfig });

    return this.cachedConfig;
  }

  /**
   * Load a single config file; missing or unparsable files count as empty
   */
  private loadConfigFile(filePath: string): FragmergeConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      logger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }

    return this.validate(raw, filePath);
  }

  private validate(raw: unknown, filePath: string): FragmergeConfig {
    if (!isRecord(raw)) {
      throw new ConfigError('expected a JSON object', { filePath, field: '(root)' });
    }

    const config: FragmergeConfig = {};

    const extensions = raw.extensions;
    if (extensions !== undefined) {
      if (!Array.isArray(extensions) || !extensions.every((ext): ext is string => typeof ext === 'string')) {
        throw new ConfigError('"extensions" must be an array of strings', { filePath, field: 'extensions' });
      }
      config.extensions = extensions;
    }

    const skipBlockComments = raw.skipBlockComments;
    if (skipBlockComments !== undefined) {
      if (typeof skipBlockComments !== 'boolean') {
        throw new ConfigError('"skipBlockComments" must be a boolean', { filePath, field: 'skipBlockComments' });
      }
      config.skipBlockComments = skipBlockComments;
    }

    const size = raw.maxFragmentSize;
    if (size !== undefined) {
      if (typeof size !== 'string' && typeof size !== 'number') {
        throw new ConfigError('"maxFragmentSize" must be a size string or a number', { filePath, field: 'maxFragmentSize' });
      }
      try {
        parseSize(size);
      } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error), { filePath, field: 'maxFragmentSize' });
      }
      config.maxFragmentSize = size;
    }

    const output = raw.output;
    if (output !== undefined) {
      if (typeof output !== 'string') {
        throw new ConfigError('"output" must be a string', { filePath, field: 'output' });
      }
      config.output = output;
    }

    return config;
  }

  /**
   * Merge two config objects; the project overrides, extension lists add up
   */
  private mergeConfigs(global: FragmergeConfig, project: FragmergeConfig): FragmergeConfig {
    const merged: FragmergeConfig = { ...global, ...project };

    if (global.extensions || project.extensions) {
      merged.extensions = [
        ...(global.extensions ?? []),
        ...(project.extensions ?? [])
      ];
    }

    return merged;
  }

  private resolve(config: FragmergeConfig): ResolvedConfig {
    const extensions = config.extensions ?? [...DEFAULT_EXTENSIONS];

    return {
      extensions: [...new Set(extensions.map(normalizeExtension))],
      skipBlockComments: config.skipBlockComments ?? false,
      maxFragmentSize: parseSize(config.maxFragmentSize ?? DEFAULT_MAX_FRAGMENT_SIZE),
      output: config.output
    };
  }
}
