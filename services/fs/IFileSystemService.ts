/**
 * File system operations needed to load fragments and write merged output
 */
export interface IFileSystemService {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  readdir(dirPath: string): Promise<string[]>;
  isDirectory(filePath: string): Promise<boolean>;
}
