import { readdirSync, statSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { isManifestFile } from '../parser/router.js';

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  '.git', '.svn', '.hg', '__pycache__', 'node_modules', '.venv', 'venv', '.env', 'env',
  'dist', 'build', '.pytest_cache', '.coverage', '.mypy_cache', '.tox',
];

/**
 * Walk rootDir and return every dependency file the router recognizes, in a
 * deterministic order (entries sorted by name, files before subdirectories).
 * Symbolic links to directories are not followed.
 */
export function discoverManifestFiles(rootDir: string, excludeDirs: readonly string[] = []): string[] {
  const excluded = new Set([...DEFAULT_EXCLUDED_DIRS, ...excludeDirs]);
  const found: string[] = [];
  walk(resolve(rootDir), excluded, found);
  return found;
}

function walk(dir: string, excluded: ReadonlySet<string>, found: string[]): void {
  const entries = safeReaddir(dir).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const subdirs: string[] = [];

  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!excluded.has(entry.name)) subdirs.push(path);
      continue;
    }
    if (!isManifestFile(entry.name)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && isFile(path))) {
      logger.debug(`Discovered ${path}`);
      found.push(path);
    }
  }

  for (const subdir of subdirs) walk(subdir, excluded, found);
}

function safeReaddir(dir: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Could not read directory ${dir}: ${errorMessage(error)}`);
    return [];
  }
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch (error) {
    logger.debug(`Skipping dangling link ${path}: ${errorMessage(error)}`);
    return false;
  }
}
