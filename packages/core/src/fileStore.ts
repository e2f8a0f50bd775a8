/**
 * On-disk file operations
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { assetFile, assertSafeRelativePath, sortFiles } from './assetFile.js';
import type { AssetFile, FileFetcher } from './types.js';

/** Prefix of in-flight files written next to their target */
export const TEMP_FILE_PREFIX = '.tmp-';

function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && codes.includes(err.code);
}

/**
 * Convert a base-name glob (`*`, `?`) to a RegExp
 */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (const char of glob) {
    if (char === '*') source += '[^/]*';
    else if (char === '?') source += '[^/]';
    else source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

/**
 * Temp path in the directory of the target
 */
export function buildTempPath(targetPath: string): string {
  const random = Math.random().toString(36).slice(2, 10);
  return path.join(path.dirname(targetPath), `${TEMP_FILE_PREFIX}${path.basename(targetPath)}-${random}`);
}

/**
 * Reads persisted files under one output directory
 */
export class DirectoryFileFetcher implements FileFetcher {
  constructor(private readonly directory: string) {}

  async fetchByName(filePath: string): Promise<AssetFile | null> {
    const safePath = assertSafeRelativePath(filePath);
    try {
      const content = await fs.readFile(path.join(this.directory, safePath));
      return assetFile(safePath, content);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT', 'EISDIR')) {
        return null;
      }
      throw err;
    }
  }

  async fetchByPattern(pattern: string): Promise<AssetFile[]> {
    const safePattern = assertSafeRelativePath(pattern, 'pattern');
    const dir = path.posix.dirname(safePattern);
    const matcher = globToRegExp(path.posix.basename(safePattern));

    let names: string[];
    try {
      const dirents = await fs.readdir(path.join(this.directory, dir), { withFileTypes: true });
      names = dirents.filter((d) => d.isFile() && !d.name.startsWith(TEMP_FILE_PREFIX)).map((d) => d.name);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT', 'ENOTDIR')) {
        return [];
      }
      throw err;
    }

    const files: AssetFile[] = [];
    for (const name of names) {
      if (!matcher.test(name)) continue;
      const relative = dir === '.' ? name : `${dir}/${name}`;
      const content = await fs.readFile(path.join(this.directory, relative));
      files.push(assetFile(relative, content));
    }
    return sortFiles(files);
  }
}

/**
 * Atomic rename (temp file → target)
 */
export async function atomicRename(tempPath: string, targetPath: string): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  await fs.rename(tempPath, targetPath);
}

/**
 * Write files under directory. Each file goes through a temp sibling and a rename.
 */
export async function writeAssetFiles(directory: string, files: readonly AssetFile[]): Promise<void> {
  for (const file of files) {
    const targetPath = path.join(directory, assertSafeRelativePath(file.path));
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = buildTempPath(targetPath);
    try {
      await fs.writeFile(tempPath, file.content);
      await atomicRename(tempPath, targetPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
  }
}

/**
 * Recursively delete directory (idempotent)
 */
export async function removeDir(dirPath: string): Promise<void> {
  await fs.rm(dirPath, { recursive: true, force: true });
}
