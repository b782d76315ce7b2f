import type { Directive, ScanOptions, ScanResult, SourceLine } from '@core/types';
import { scannerLogger as logger } from '@core/utils/logger';
import type { IDirectiveScanner } from './IDirectiveScanner';

export const FRAGMENT_NAME_PATTERN = /^[A-Za-z0-9_.]+$/;

// Directives are line prefixes; whatever follows them is kept as trailing text
const INCLUDE_LINE = /^[ \t]*#include[ \t]+<([A-Za-z0-9_.]+)>(.*)$/;
const PRAGMA_ONCE_LINE = /^[ \t]*#pragma[ \t]+once\b(.*)$/;

/**
 * Split text into lines, keeping each line's terminator.
 */
export function splitLines(content: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;

  while (start < content.length) {
    const newline = content.indexOf('\n', start);
    if (newline === -1) {
      lines.push({ text: content.slice(start), eol: '' });
      break;
    }

    const crlf = newline > start && content[newline - 1] === '\r';
    lines.push({
      text: content.slice(start, crlf ? newline - 1 : newline),
      eol: crlf ? '\r\n' : '\n'
    });
    start = newline + 1;
  }

  return lines;
}

/**
 * Track whether the end of a line is inside a block comment.
 * String literals are not considered.
 */
export function endsInBlockComment(text: string, inComment: boolean): boolean {
  let i = 0;
  let open = inComment;

  while (i < text.length) {
    if (open) {
      const close = text.indexOf('*/', i);
      if (close === -1) return true;
      open = false;
      i = close + 2;
      continue;
    }

    const lineComment = text.indexOf('//', i);
    const blockComment = text.indexOf('/*', i);
    if (blockComment === -1) return false;
    if (lineComment !== -1 && lineComment < blockComment) return false;
    open = true;
    i = blockComment + 2;
  }

  return open;
}

export class DirectiveScanner implements IDirectiveScanner {
  private readonly skipBlockComments: boolean;

  constructor(options: ScanOptions = {}) {
    this.skipBlockComments = options.skipBlockComments ?? false;
  }

  scan(content: string): ScanResult {
    const lines = splitLines(content);
    const directives: Directive[] = [];
    const includes = new Set<string>();
    let includeOnce = false;
    let inComment = false;

    lines.forEach(({ text }, index) => {
      const commented = this.skipBlockComments && inComment;
      if (this.skipBlockComments) {
        inComment = endsInBlockComment(text, inComment);
      }
      if (commented) return;

      const include = INCLUDE_LINE.exec(text);
      if (include) {
        includes.add(include[1]);
        directives.push({ kind: 'include', name: include[1], line: index, trailing: include[2].trim() });
        return;
      }

      const pragma = PRAGMA_ONCE_LINE.exec(text);
      if (pragma) {
        includeOnce = true;
        directives.push({ kind: 'pragma-once', line: index, trailing: pragma[1].trim() });
      }
    });

    logger.debug('Scanned fragment', {
      lineCount: lines.length,
      includes: [...includes],
      includeOnce
    });

    return {
      includes: [...includes],
      includeOnce,
      directives,
      lines
    };
  }
}
