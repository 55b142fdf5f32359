/**
 * @fileoverview Default IFileSystem implementation using Node.js fs module.
 *
 * @module core/defaultFileSystem
 */

import * as fs from 'fs';
import type { FileStats, IFileSystem } from '../interfaces/IFileSystem';

/**
 * Default file system implementation backed by Node.js fs module.
 */
export class DefaultFileSystem implements IFileSystem {
  async readFileAsync(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, 'utf-8');
  }

  async writeFileAsync(filePath: string, content: string): Promise<void> {
    await fs.promises.writeFile(filePath, content, 'utf-8');
  }

  async renameAsync(oldPath: string, newPath: string): Promise<void> {
    await fs.promises.rename(oldPath, newPath);
  }

  async unlinkAsync(filePath: string): Promise<void> {
    await fs.promises.unlink(filePath);
  }

  async mkdirAsync(dirPath: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.promises.mkdir(dirPath, options);
  }

  async statAsync(filePath: string): Promise<FileStats> {
    const stats = await fs.promises.stat(filePath);
    return { mtimeMs: stats.mtimeMs };
  }
}
