/**
 * Source File Discovery
 *
 * Resolves the path given on the command line into the ordered list of
 * files to analyze: a single source file, or every source file below a
 * directory, sorted lexicographically.
 */

import type { Dirent, Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import type { DiscoveryConfig } from '../config/schema.js';
import { InputError } from '../errors/index.js';
import { shouldIgnoreDirectory } from './default-ignores.js';

export type DiscoveryOptions = Partial<DiscoveryConfig>;

/**
 * Find the source files to analyze under `target`.
 *
 * @throws InputError when `target` does not exist, or is a file without a
 * matching extension
 */
export async function discoverSourceFiles(
  target: string,
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const extensions = (options.extensions ?? ['.py']).map((ext) => ext.toLowerCase());
  const exclude = options.exclude ?? [];
  const useDefaultIgnores = options.useDefaultIgnores ?? true;

  const stats = await statOrNull(target);
  if (!stats) {
    throw new InputError(target, 'not-found');
  }

  if (stats.isFile()) {
    if (!hasExtension(target, extensions)) {
      throw new InputError(target, 'unsupported-file');
    }
    return [target];
  }

  if (!stats.isDirectory()) {
    throw new InputError(target, 'not-a-file');
  }

  const files: string[] = [];

  async function walk(dir: string, relativeDir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (isExcluded(relativePath, exclude)) {
        continue;
      }

      if (entry.isDirectory()) {
        if (useDefaultIgnores && shouldIgnoreDirectory(entry.name)) {
          continue;
        }
        await walk(path.join(dir, entry.name), relativePath);
      } else if (hasExtension(entry.name, extensions) && (await isFileEntry(dir, entry))) {
        files.push(path.join(dir, entry.name));
      }
    }
  }

  await walk(target, '');

  return files.sort();
}

/**
 * Regular files, and symlinks that resolve to one. Symlinked directories
 * are not followed.
 */
async function isFileEntry(dir: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  const stats = await statOrNull(path.join(dir, entry.name));
  return stats !== null && stats.isFile();
}

function hasExtension(filePath: string, extensions: readonly string[]): boolean {
  return extensions.includes(path.extname(filePath).toLowerCase());
}

function isExcluded(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true, matchBase: !pattern.includes('/') }));
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}
