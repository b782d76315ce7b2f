import { describe, expect, it } from 'vitest';
import { IncludeError } from '@core/errors/IncludeError';
import { ArgumentParser } from './ArgumentParser';

describe('ArgumentParser', () => {
  const parser = new ArgumentParser();

  it('collects inputs and flags', () => {
    const options = parser.parseArgs(['shaders/', '-o', 'out.frag', '--skip-block-comments', 'extra.glsl', '-v']);

    expect(options).toEqual({
      inputs: ['shaders/', 'extra.glsl'],
      output: 'out.frag',
      skipBlockComments: true,
      verbose: true
    });
  });

  it('splits the extension list', () => {
    expect(parser.parseArgs(['--ext', '.frag, glsl,,', 'dir']).extensions).toEqual(['.frag', 'glsl']);
  });

  it('treats everything after -- as input', () => {
    expect(parser.parseArgs(['--order', '--', '--weird-name.glsl']).inputs).toEqual(['--weird-name.glsl']);
  });

  it('rejects unknown options', () => {
    expect(() => parser.parseArgs(['--watch'])).toThrow('Unknown option: --watch');
  });

  it('rejects an option missing its value', () => {
    try {
      parser.parseArgs(['main.frag', '--output']);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(IncludeError);
      if (error instanceof IncludeError) {
        expect(error.code).toBe('INVALID_ARGUMENTS');
        expect(error.message).toBe('Option --output requires a value');
      }
    }
  });
});
