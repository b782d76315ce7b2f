import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Runtime dependencies stay external
const externalDependencies = [
  'chalk',
  'winston'
];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const configureEsbuild = (options: EsbuildOptions): void => {
  options.alias = {
    '@core': './core',
    '@services': './services',
    '@api': './api',
    '@cli': './cli'
  };
  options.platform = 'node';
  options.target = 'node20';
};

export default defineConfig([
  // Library build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['esm'],
    dts: false,
    clean: true,
    sourcemap: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.mjs' };
    },
    external: externalDependencies,
    esbuildOptions: configureEsbuild
  },
  // CLI build
  {
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: ['esm'],
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.mjs' };
    },
    external: externalDependencies,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions: configureEsbuild
  }
]);
