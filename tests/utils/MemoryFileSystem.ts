import type { IFileSystemService } from '@services/fs/IFileSystemService';

interface NodeError extends Error {
  code?: string;
  path?: string;
}

/**
 * In-memory file system for testing
 */
export class MemoryFileSystem implements IFileSystemService {
  private files = new Map<string, string>();
  private directories = new Set<string>(['/']);

  constructor(initialFiles: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initialFiles)) {
      this.setFile(filePath, content);
    }
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(this.normalizePath(filePath));
    if (content === undefined) {
      throw this.enoent(filePath, 'open');
    }
    return content;
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.setFile(filePath, content);
  }

  async readdir(dirPath: string): Promise<string[]> {
    const normalizedPath = this.normalizePath(dirPath);
    if (!this.directories.has(normalizedPath)) {
      throw this.enoent(dirPath, 'scandir');
    }

    const prefix = normalizedPath === '/' ? '/' : normalizedPath + '/';
    const entries = new Set<string>();
    for (const entryPath of [...this.files.keys(), ...this.directories]) {
      if (entryPath.startsWith(prefix) && entryPath !== prefix) {
        const firstSegment = entryPath.slice(prefix.length).split('/')[0];
        if (firstSegment) {
          entries.add(firstSegment);
        }
      }
    }

    return Array.from(entries).sort();
  }

  async isDirectory(filePath: string): Promise<boolean> {
    return this.directories.has(this.normalizePath(filePath));
  }

  /**
   * Snapshot of every file, for assertions
   */
  getFiles(): Record<string, string> {
    return Object.fromEntries(this.files);
  }

  private setFile(filePath: string, content: string): void {
    const normalizedPath = this.normalizePath(filePath);
    this.addDirectoryChain(this.dirname(normalizedPath));
    this.files.set(normalizedPath, content);
  }

  private addDirectoryChain(dirPath: string): void {
    let current = '';
    for (const part of dirPath.split('/').filter(p => p)) {
      current = `${current}/${part}`;
      this.directories.add(current);
    }
  }

  private enoent(filePath: string, syscall: string): NodeError {
    const error: NodeError = new Error(`ENOENT: no such file or directory, ${syscall} '${filePath}'`);
    error.code = 'ENOENT';
    error.path = filePath;
    return error;
  }

  private normalizePath(filePath: string): string {
    const absolute = filePath.startsWith('/') ? filePath : `/${filePath}`;
    const normalized = absolute.replace(/\/+/g, '/').replace(/\/\.\//g, '/');
    return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
  }

  private dirname(filePath: string): string {
    const index = filePath.lastIndexOf('/');
    return index <= 0 ? '/' : filePath.slice(0, index);
  }
}
