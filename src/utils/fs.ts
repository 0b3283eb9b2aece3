/**
 * File System Utilities
 * Path containment helpers used by sketch validation
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Check synchronously whether a path exists
 */
export function pathExistsSync(target: string): boolean {
  try {
    fs.accessSync(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Follow symlinks to the physical path. A path that does not exist is
 * returned resolved but otherwise unchanged.
 */
export function realPathSync(target: string): string {
  try {
    return fs.realpathSync(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return path.resolve(target);
    }
    throw error;
  }
}

/**
 * True when `target` is `directory` itself or lies beneath it.
 * Both paths are resolved first; no symlinks are followed.
 */
export function isWithinDirectory(directory: string, target: string): boolean {
  const resolvedBase = path.resolve(directory);
  const resolvedTarget = path.resolve(target);
  if (resolvedTarget === resolvedBase) {
    return true;
  }
  const prefix = resolvedBase.endsWith(path.sep) ? resolvedBase : resolvedBase + path.sep;
  return resolvedTarget.startsWith(prefix);
}

