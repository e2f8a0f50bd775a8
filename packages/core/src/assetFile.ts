/**
 * File artifact helpers and the file-set merger
 */

import * as path from 'path';
import { DuplicateFileError } from './errors.js';
import type { AssetFile } from './types.js';

export function assertSafeRelativePath(value: string, name = 'path'): string {
  if (typeof value !== 'string') {
    throw new Error(`${name} must be a string`);
  }
  if (!value.trim()) {
    throw new Error(`${name} must be a non-empty relative path`);
  }
  if (value.includes('\0')) {
    throw new Error(`${name} must not contain null bytes`);
  }
  if (path.isAbsolute(value) || path.posix.isAbsolute(value)) {
    throw new Error(`${name} must be a relative path`);
  }
  const segments = value.split(/[\\/]+/);
  if (segments.some((seg) => seg === '..')) {
    throw new Error(`${name} must not contain ".." segments`);
  }
  return value;
}

/**
 * Build a file artifact. Windows separators are normalized to `/`.
 */
export function assetFile(filePath: string, content: string | Buffer): AssetFile {
  const normalized = assertSafeRelativePath(filePath).split(path.win32.sep).join('/');
  return Object.freeze({
    path: normalized,
    content: typeof content === 'string' ? Buffer.from(content, 'utf-8') : content,
  });
}

/**
 * Byte-wise path comparison
 */
export function compareFilePaths(a: AssetFile, b: AssetFile): number {
  return Buffer.compare(Buffer.from(a.path, 'utf-8'), Buffer.from(b.path, 'utf-8'));
}

/**
 * Sorted copy, by path
 */
export function sortFiles(files: readonly AssetFile[]): AssetFile[] {
  return [...files].sort(compareFilePaths);
}

/**
 * Concatenate file sets into one sorted list. The result does not depend on
 * the order of the sets.
 * @param owner identity reported when two files share a path
 */
export function mergeFileSets(owner: string, ...sets: ReadonlyArray<readonly AssetFile[]>): AssetFile[] {
  const seen = new Set<string>();
  const merged: AssetFile[] = [];
  for (const set of sets) {
    for (const file of set) {
      if (seen.has(file.path)) {
        throw new DuplicateFileError(owner, file.path);
      }
      seen.add(file.path);
      merged.push(file);
    }
  }
  return sortFiles(merged);
}
