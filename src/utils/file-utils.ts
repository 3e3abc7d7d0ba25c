/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Check if a path is a directory
 */
export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find all files below a directory whose name ends with the suffix
 * (case-insensitive). Returns absolute paths, sorted for stable ordering.
 */
export function findFilesBySuffix(dirPath: string, suffix: string): string[] {
  if (!isDirectory(dirPath)) {
    return [];
  }

  const lowerSuffix = suffix.toLowerCase();
  const found: string[] = [];

  const walk = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(lowerSuffix)) {
        found.push(path.resolve(fullPath));
      }
    }
  };

  walk(dirPath);
  return found.sort();
}

/**
 * Strip a suffix from a file's basename
 * Example: ("/path/to/T_WALK.samples.json", ".samples.json") -> "T_WALK"
 */
export function getBasenameWithoutSuffix(filePath: string, suffix: string): string {
  const basename = path.basename(filePath);
  if (basename.toLowerCase().endsWith(suffix.toLowerCase())) {
    return basename.slice(0, basename.length - suffix.length);
  }
  return basename.replace(/\.[^/.]+$/, '');
}

/**
 * Ensures a directory exists, creating it if necessary
 */
export function ensureDirectoryExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Resolve a configured directory against the working directory
 */
export function resolveDirectory(dirPath: string, cwd: string = process.cwd()): string {
  return path.isAbsolute(dirPath) ? dirPath : path.resolve(cwd, dirPath);
}
