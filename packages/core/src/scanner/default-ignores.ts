/**
 * Default Ignore Directories
 *
 * Directories skipped while discovering Python sources: version control,
 * virtual environments, tool caches and build output. Nothing in them is
 * code the project owns.
 *
 * @module scanner/default-ignores
 */

/**
 * Directory names to always skip (simple string matching).
 */
export const DEFAULT_IGNORE_DIRECTORIES: readonly string[] = [
  // === Version control ===
  '.git',
  '.svn',
  '.hg',

  // === Virtual environments ===
  '.venv',
  'venv',
  'env',
  '.env',
  '__pypackages__',

  // === Caches ===
  '__pycache__',
  '.mypy_cache',
  '.pytest_cache',
  '.ruff_cache',
  '.pytype',
  '.hypothesis',
  '.tox',
  '.nox',
  '.cache',

  // === Build and packaging ===
  'build',
  'dist',
  '.eggs',
  'htmlcov',
  'site-packages',

  // === Other ecosystems living next to Python code ===
  'node_modules',
  '.idea',
  '.vscode',
] as const;

const ignoreDirectorySet = new Set(DEFAULT_IGNORE_DIRECTORIES);

/**
 * Check if a directory name should be ignored.
 * Hidden directories are skipped too, except CI configuration folders.
 */
export function shouldIgnoreDirectory(dirName: string): boolean {
  if (ignoreDirectorySet.has(dirName)) {
    return true;
  }

  // *.egg-info metadata directories
  if (dirName.endsWith('.egg-info')) {
    return true;
  }

  if (dirName.startsWith('.') && dirName !== '.' && dirName !== '..') {
    const allowedHidden = ['.github', '.circleci', '.gitlab'];
    return !allowedHidden.includes(dirName);
  }

  return false;
}

/**
 * Get default ignore directories as a single array.
 */
export function getDefaultIgnoreDirectories(): string[] {
  return [...DEFAULT_IGNORE_DIRECTORIES];
}
