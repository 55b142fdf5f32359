/**
 * @fileoverview Write-to-temp-then-rename helper shared by the file stores.
 *
 * Readers see either the previous file or the new one, never a partial
 * write. Each call uses its own temp name, so racing writers in separate
 * processes settle on whichever rename lands last.
 *
 * @module core/atomicWrite
 */

import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { IFileSystem } from '../interfaces/IFileSystem';

export function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  return path.join(dir, `.${base}.${uuidv4()}.tmp`);
}

/**
 * Write `content` to `filePath` atomically, creating the parent directory.
 * On failure the temp file is removed and the original error rethrown.
 */
export async function writeFileAtomic(fs: IFileSystem, filePath: string, content: string): Promise<void> {
  const tempFile = tempPathFor(filePath);
  try {
    await fs.mkdirAsync(path.dirname(filePath), { recursive: true });
    await fs.writeFileAsync(tempFile, content);
    await fs.renameAsync(tempFile, filePath);
  } catch (error) {
    try { await fs.unlinkAsync(tempFile); } catch { /* temp file never created */ }
    throw error;
  }
}
