import type { ScanResult } from '@core/types';

/**
 * Extracts include directives and the include-once marker from fragment text.
 */
export interface IDirectiveScanner {
  /**
   * Scan one fragment's raw content.
   * Only lines consisting of a directive (plus surrounding spaces or tabs)
   * count; directive text anywhere else in a line is plain text.
   */
  scan(content: string): ScanResult;
}
