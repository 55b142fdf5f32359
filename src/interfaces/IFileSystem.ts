/**
 * @fileoverview Interface for file system operations abstraction.
 *
 * The snapshot cache and the history log do all their I/O through this
 * interface so they can be unit tested against an in-memory fake.
 *
 * Implementations must reject with a Node-style error whose `code` is
 * `'ENOENT'` when a path does not exist; callers rely on that to treat a
 * missing store as empty.
 *
 * @module interfaces/IFileSystem
 */

/**
 * Subset of file metadata the stores need.
 */
export interface FileStats {
  /** Last modification time, milliseconds since the epoch */
  mtimeMs: number;
}

/**
 * Interface for file system operations.
 *
 * @example
 * ```typescript
 * class SnapshotWriter {
 *   constructor(private readonly fs: IFileSystem) {}
 *
 *   async write(file: string, body: string): Promise<void> {
 *     await this.fs.mkdirAsync(dirname(file), { recursive: true });
 *     await this.fs.writeFileAsync(`${file}.tmp`, body);
 *     await this.fs.renameAsync(`${file}.tmp`, file);
 *   }
 * }
 * ```
 */
export interface IFileSystem {
  /** Read a file as UTF-8 string. */
  readFileAsync(filePath: string): Promise<string>;

  /** Write a UTF-8 string to a file, replacing any existing content. */
  writeFileAsync(filePath: string, content: string): Promise<void>;

  /** Rename/move a file, replacing the destination if it exists. */
  renameAsync(oldPath: string, newPath: string): Promise<void>;

  /** Delete a file. */
  unlinkAsync(filePath: string): Promise<void>;

  /** Create directories. */
  mkdirAsync(dirPath: string, options?: { recursive?: boolean }): Promise<void>;

  /** Get file metadata. */
  statAsync(filePath: string): Promise<FileStats>;
}

/**
 * True when `error` is a Node-style "no such file or directory" error.
 */
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
