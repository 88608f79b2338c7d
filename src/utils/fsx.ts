/**
 * File system utilities for glob patterns and path operations
 */

import { glob, escape } from 'glob';
import { access, stat, unlink } from 'node:fs/promises';
import { constants } from 'node:fs';
import { debugError } from './debug.js';

export interface RemoveResult {
  removed: string[];
  failed: Array<{ path: string; message: string }>;
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    const err = error as Error;
    debugError('fsx', 'fileExists', {
      filePath,
      message: err.message,
    });
    return false;
  }
}

/**
 * Check that a path is a regular file the current user may execute
 */
export async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) return false;
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find files in a directory whose names start with a literal prefix and end
 * with one of the given extensions. Returns sorted absolute paths.
 */
export async function findFilesWithPrefix(
  dir: string,
  prefix: string,
  extensions: string[]
): Promise<string[]> {
  const escaped = escape(prefix);
  const files: string[] = [];

  for (const ext of extensions) {
    const suffix = ext.startsWith('.') ? ext : `.${ext}`;
    const pattern = `${escaped}*${suffix}`;
    try {
      const matches = await glob(pattern, {
        cwd: dir,
        absolute: true,
        nodir: true,
      });
      files.push(...matches);
    } catch (error) {
      const err = error as Error;
      debugError('fsx', 'findFilesWithPrefix', {
        dir,
        pattern,
        message: err.message,
      });
      throw new Error(`Failed to glob pattern "${pattern}" in "${dir}": ${err.message}`);
    }
  }

  return [...new Set(files)].sort();
}

/**
 * Delete files, collecting failures instead of throwing
 */
export async function removeFiles(paths: string[]): Promise<RemoveResult> {
  const result: RemoveResult = { removed: [], failed: [] };

  for (const path of paths) {
    try {
      await unlink(path);
      result.removed.push(path);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      // Already gone
      if (err.code === 'ENOENT') continue;
      debugError('fsx', 'removeFiles', {
        path,
        code: err.code,
        message: err.message,
      });
      result.failed.push({ path, message: err.message });
    }
  }

  return result;
}

/**
 * Normalize path for display (convert backslashes to forward slashes)
 */
export function displayPath(path: string): string {
  return path.replace(/\\/g, '/');
}
