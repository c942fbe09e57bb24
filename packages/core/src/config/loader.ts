/**
 * Configuration file loading
 *
 * A project may keep a `.stylelens.json` next to the code it checks. The
 * file is optional; when a path is given explicitly it must exist.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError } from '../errors/index.js';
import { DEFAULT_CONFIG, validateConfig, type StyleLensConfig } from './schema.js';

export const CONFIG_FILE_NAME = '.stylelens.json';

export interface LoadConfigOptions {
  /** Fail when the file does not exist (default: false) */
  required?: boolean;
}

/**
 * Read and validate a configuration file.
 *
 * @throws ConfigError when the file is unreadable, not JSON, or invalid
 */
export async function loadConfigFile(
  filePath: string,
  options: LoadConfigOptions = {}
): Promise<StyleLensConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error) && !options.required) {
      return { ...DEFAULT_CONFIG, extensions: [...DEFAULT_CONFIG.extensions], exclude: [] };
    }
    throw new ConfigError(filePath, error instanceof Error ? error.message : 'cannot be read');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(filePath, `invalid JSON (${error instanceof Error ? error.message : 'parse error'})`);
  }

  const result = validateConfig(parsed);
  if (!result.valid) {
    throw new ConfigError(filePath, 'invalid configuration', result.errors);
  }

  return result.config;
}

/**
 * Load `.stylelens.json` from a directory, falling back to defaults.
 */
export async function loadProjectConfig(projectRoot: string): Promise<StyleLensConfig> {
  return loadConfigFile(path.join(projectRoot, CONFIG_FILE_NAME));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
