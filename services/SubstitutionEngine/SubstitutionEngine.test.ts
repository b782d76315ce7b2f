import { describe, it, expect } from 'vitest';
import type { ProcessingOrder, ScanResult } from '@core/types';
import { DirectiveScanner } from '@services/DirectiveScanner/DirectiveScanner';
import { SubstitutionEngine } from './SubstitutionEngine';

const scanner = new DirectiveScanner();

function scansOf(fragments: Record<string, string>): Map<string, ScanResult> {
  return new Map(Object.entries(fragments).map(([name, content]) => [name, scanner.scan(content)]));
}

describe('SubstitutionEngine', () => {
  const engine = new SubstitutionEngine();

  it('inserts an include-once fragment only at its first resolution', () => {
    const scans = scansOf({
      base: '#version 450\n#include <incl0>\n#include <incl1>\nvoid main() {}\n',
      incl0: '#include <incl2>\nfloat a;\n',
      incl1: '#include <incl2>\nfloat b;\n',
      incl2: '#pragma once\nfloat c;\n'
    });
    const order: ProcessingOrder = { root: 'base', order: ['incl2', 'incl0', 'incl1', 'base'] };

    expect(engine.substitute(order, scans)).toBe(
      '#version 450\nfloat c;\nfloat a;\nfloat b;\nvoid main() {}\n'
    );
  });

  it('follows the processing order when choosing where the include-once text lands', () => {
    const scans = scansOf({
      base: '#include <incl0>\n#include <incl1>\n',
      incl0: '#include <incl2>\nfloat a;\n',
      incl1: '#include <incl2>\nfloat b;\n',
      incl2: '#pragma once\nfloat c;\n'
    });
    const order: ProcessingOrder = { root: 'base', order: ['incl2', 'incl1', 'incl0', 'base'] };

    expect(engine.substitute(order, scans)).toBe('float a;\nfloat c;\nfloat b;\n');
  });

  it('repeats fragments without #pragma once in every includer', () => {
    const scans = scansOf({
      base: '#include <incl0>\n#include <incl1>\n',
      incl0: '#include <incl2>\nfloat a;\n',
      incl1: '#include <incl2>\nfloat b;\n',
      incl2: 'float c;\n'
    });
    const order: ProcessingOrder = { root: 'base', order: ['incl2', 'incl0', 'incl1', 'base'] };

    expect(engine.substitute(order, scans)).toBe('float c;\nfloat a;\nfloat c;\nfloat b;\n');
  });

  it('replaces the first duplicate directive and deletes the rest', () => {
    const scans = scansOf({
      base: '#include <a>\nx\n#include <a>\ny\n',
      a: 'A'
    });

    expect(engine.substitute({ root: 'base', order: ['a', 'base'] }, scans)).toBe('A\nx\ny\n');
  });

  it('keeps the directive line break only when the inserted text lacks one', () => {
    const scans = scansOf({
      base: '#include <a>\n#include <b>\nend',
      a: 'A',
      b: 'B\n'
    });

    expect(engine.substitute({ root: 'base', order: ['a', 'b', 'base'] }, scans)).toBe('A\nB\nend');
  });

  it('keeps text after a directive on its own line', () => {
    const scans = scansOf({
      base: '#include <a> // first\nx\n#include <a> // again\n',
      a: '#pragma once // guard\nA'
    });

    expect(engine.substitute({ root: 'base', order: ['a', 'base'] }, scans)).toBe(
      '// guard\nA\n// first\nx\n// again\n'
    );
  });

  it('preserves CRLF terminators', () => {
    const scans = scansOf({
      base: '#include <a>\r\nmain\r\n',
      a: 'A'
    });

    expect(engine.substitute({ root: 'base', order: ['a', 'base'] }, scans)).toBe('A\r\nmain\r\n');
  });

  it('removes the directive line entirely for an empty dependency', () => {
    const scans = scansOf({ base: '#include <empty>\nz', empty: '' });

    expect(engine.substitute({ root: 'base', order: ['empty', 'base'] }, scans)).toBe('z');
  });

  it('strips #pragma once from the root', () => {
    const scans = scansOf({ base: '#pragma once\nroot\n' });

    expect(engine.substitute({ root: 'base', order: ['base'] }, scans)).toBe('root\n');
  });

  it('leaves the indentation of surrounding lines alone', () => {
    const scans = scansOf({
      base: 'void main() {\n    #include <body>\n}\n',
      body: '    gl_FragColor = vec4(1.0);\n'
    });

    expect(engine.substitute({ root: 'base', order: ['body', 'base'] }, scans)).toBe(
      'void main() {\n    gl_FragColor = vec4(1.0);\n}\n'
    );
  });

  it('fails on an order naming an unscanned fragment', () => {
    expect(() => engine.substitute({ root: 'ghost', order: ['ghost'] }, new Map())).toThrow(
      'No scan result for fragment "ghost"'
    );
  });
});
