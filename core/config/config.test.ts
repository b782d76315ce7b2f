import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as path from 'path';
import * as os from 'os';
import { ConfigLoader } from './loader';
import { parseSize, formatSize, normalizeExtension } from './utils';
import { ConfigError } from '@core/errors/ConfigError';

// Mock fs module
vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn()
}));

import * as fs from 'fs';

const GLOBAL_CONFIG = path.join(os.homedir(), '.config', 'fragmerge.json');
const PROJECT_CONFIG = path.join('/project', 'fragmerge.config.json');

function useConfigFiles(files: Record<string, string>): void {
  vi.mocked(fs.existsSync).mockImplementation(filePath => String(filePath) in files);
  vi.mocked(fs.readFileSync).mockImplementation(filePath => files[String(filePath)]);
}

describe('Configuration System', () => {
  describe('Size Parsing', () => {
    it('should parse bytes', () => {
      expect(parseSize('100')).toBe(100);
      expect(parseSize('1024B')).toBe(1024);
      expect(parseSize(2048)).toBe(2048);
    });

    it('should parse larger units with or without the trailing B', () => {
      expect(parseSize('1KB')).toBe(1024);
      expect(parseSize('512K')).toBe(512 * 1024);
      expect(parseSize('1.5MB')).toBe(1.5 * 1024 * 1024);
      expect(parseSize('2gb')).toBe(2 * 1024 * 1024 * 1024);
    });

    it('should throw on invalid format', () => {
      expect(() => parseSize('big')).toThrow('Invalid size format');
      expect(() => parseSize('5XB')).toThrow('Invalid size format');
    });

    it('should format sizes', () => {
      expect(formatSize(512)).toBe('512B');
      expect(formatSize(1536)).toBe('1.5KB');
      expect(formatSize(2 * 1024 * 1024)).toBe('2.0MB');
    });

    it('should normalize extensions', () => {
      expect(normalizeExtension('FRAG')).toBe('.frag');
      expect(normalizeExtension(' .glsl ')).toBe('.glsl');
    });
  });

  describe('ConfigLoader', () => {
    beforeEach(() => {
      vi.mocked(fs.existsSync).mockReset();
      vi.mocked(fs.readFileSync).mockReset();
    });

    it('should fall back to defaults without config files', () => {
      useConfigFiles({});

      expect(new ConfigLoader('/project').load()).toEqual({
        extensions: ['.glsl', '.vert', '.frag', '.comp', '.geom', '.tesc', '.tese', '.wgsl'],
        skipBlockComments: false,
        maxFragmentSize: 1024 * 1024,
        output: undefined
      });
    });

    it('should let the project override the global config', () => {
      useConfigFiles({
        [GLOBAL_CONFIG]: JSON.stringify({ skipBlockComments: true, maxFragmentSize: '64KB', extensions: ['.glsl'] }),
        [PROJECT_CONFIG]: JSON.stringify({ maxFragmentSize: 2048, extensions: ['frag', '.GLSL'], output: 'out/main.frag' })
      });

      expect(new ConfigLoader('/project').load()).toEqual({
        extensions: ['.glsl', '.frag'],
        skipBlockComments: true,
        maxFragmentSize: 2048,
        output: 'out/main.frag'
      });
    });

    it('should skip unparsable files', () => {
      useConfigFiles({
        [GLOBAL_CONFIG]: '{ not json',
        [PROJECT_CONFIG]: JSON.stringify({ skipBlockComments: true })
      });

      expect(new ConfigLoader('/project').load().skipBlockComments).toBe(true);
    });

    it('should reject fields of the wrong type', () => {
      useConfigFiles({
        [PROJECT_CONFIG]: JSON.stringify({ extensions: '.frag' })
      });

      try {
        new ConfigLoader('/project').load();
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.code).toBe('INVALID_CONFIG');
          expect(error.details).toEqual({ filePath: PROJECT_CONFIG, field: 'extensions' });
        }
      }
    });

    it('should reject malformed sizes', () => {
      useConfigFiles({
        [PROJECT_CONFIG]: JSON.stringify({ maxFragmentSize: 'huge' })
      });

      expect(() => new ConfigLoader('/project').load()).toThrow(ConfigError);
    });

    it('should cache the resolved config', () => {
      useConfigFiles({});
      const loader = new ConfigLoader('/project');

      expect(loader.load()).toBe(loader.load());
      expect(fs.existsSync).toHaveBeenCalledTimes(2);
    });
  });
});
