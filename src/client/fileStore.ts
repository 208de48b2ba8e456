/**
 * Local file access for the client.
 *
 * Paths named by the remote side are untrusted: they are resolved against
 * the codebase root and anything that would land outside it is rejected.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { InvalidPathError } from '../errors.js';
import { DEFAULT_MAX_FILE_BYTES } from '../config/settings.js';

export interface FileReader {
  /** Read a file named relative to the codebase root */
  readFile(filePath: string): Promise<string>;
}

export class LocalFileStore implements FileReader {
  private readonly rootDir: string;
  private readonly maxFileBytes: number;

  constructor(rootDir: string, options: { maxFileBytes?: number } = {}) {
    this.rootDir = path.resolve(rootDir);
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  }

  /**
   * Map a requested path to an absolute path inside the root.
   * An absolute path is accepted only when it already points inside the root,
   * since the snapshot is keyed by the absolute root and may be echoed back.
   *
   * @throws InvalidPathError
   */
  resolvePath(filePath: string): string {
    if (filePath.trim() === '') {
      throw new InvalidPathError('Invalid path: empty path');
    }

    const normalized = path.normalize(filePath);
    const relative = path.isAbsolute(normalized) ? path.relative(this.rootDir, normalized) : normalized;

    if (path.isAbsolute(relative)) {
      throw new InvalidPathError(`Invalid path: ${filePath} is outside the codebase root`);
    }

    // Reject path traversal attempts
    if (relative === '..' || relative.startsWith(`..${path.sep}`)) {
      throw new InvalidPathError(`Invalid path: path traversal not allowed (${filePath})`);
    }

    const fullPath = path.resolve(this.rootDir, relative);
    if (fullPath !== this.rootDir && !fullPath.startsWith(this.rootDir + path.sep)) {
      throw new InvalidPathError(`Invalid path: ${filePath} must be within the codebase root`);
    }

    return fullPath;
  }

  async readFile(filePath: string): Promise<string> {
    const fullPath = this.resolvePath(filePath);

    const stats = await fs.stat(fullPath);
    if (!stats.isFile()) {
      throw new Error(`Not a regular file: ${filePath}`);
    }
    if (stats.size > this.maxFileBytes) {
      throw new Error(
        `File too large: ${filePath} (${(stats.size / 1024 / 1024).toFixed(2)}MB > ${(this.maxFileBytes / 1024 / 1024).toFixed(2)}MB limit)`
      );
    }

    return fs.readFile(fullPath, 'utf-8');
  }
}
