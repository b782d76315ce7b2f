/**
 * Parse human-readable size to bytes
 * Examples: "10MB" -> 10485760, "1.5KB" -> 1536, "512K" -> 524288
 */
export function parseSize(size: string | number): number {
  if (typeof size === 'number') {
    return size;
  }

  const match = size.trim().match(/^(\d+(?:\.\d+)?)\s*([KMG]?B?)$/i);
  if (!match) {
    throw new Error(`Invalid size format: ${size}`);
  }

  const value = parseFloat(match[1]);
  let unit = match[2].toUpperCase() || 'B';
  if (unit !== 'B' && !unit.endsWith('B')) {
    unit += 'B';
  }

  const multipliers: Record<string, number> = {
    'B': 1,
    'KB': 1024,
    'MB': 1024 * 1024,
    'GB': 1024 * 1024 * 1024
  };

  return Math.floor(value * multipliers[unit]);
}

/**
 * Format bytes to human-readable size
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)}GB`;
}

/**
 * Normalize an extension to a lowercase, dot-prefixed form
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}
