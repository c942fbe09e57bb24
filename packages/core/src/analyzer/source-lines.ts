/**
 * Source text handling shared by the reader and the line pipeline.
 */

import * as fs from 'node:fs';
import { InputError } from '../errors/index.js';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Normalize line endings to `\n` and drop a leading byte-order mark, so the
 * parser and the line pipeline number lines identically.
 */
export function normalizeSource(source: string): string {
  const withoutBom = source.startsWith(BYTE_ORDER_MARK) ? source.slice(1) : source;
  return withoutBom.replace(/\r\n?/g, '\n');
}

/**
 * Split normalized source into raw lines. Every line keeps its `\n`
 * terminator except a last line that has none.
 */
export function splitLines(source: string): string[] {
  return source.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Read a source file as UTF-8 text.
 *
 * The file handle is closed whether or not the read succeeds.
 *
 * @throws InputError when the path is missing or not a regular file
 */
export function readSourceFile(filePath: string): string {
  const stats = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stats) {
    throw new InputError(filePath, 'not-found');
  }
  if (!stats.isFile()) {
    throw new InputError(filePath, 'not-a-file');
  }

  const fd = fs.openSync(filePath, 'r');
  try {
    return fs.readFileSync(fd, 'utf-8');
  } finally {
    fs.closeSync(fd);
  }
}
