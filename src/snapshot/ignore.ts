/**
 * Ignore matching for the snapshot walk.
 *
 * Patterns are simpler than .gitignore: a path is excluded when
 * its base name glob-matches a pattern, or when the path starts with a
 * pattern verbatim. There is no negation, anchoring or directory-only syntax.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { errnoCode } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { SnapshotSettings } from '../config/settings.js';

/** Entries excluded when `useDefaultExcludes` is on */
export const DEFAULT_EXCLUDES: readonly string[] = [
  // === Version Control ===
  '.git',
  '.svn',
  '.hg',

  // === Dependencies & Build Output ===
  'node_modules',
  'dist',
  'target',
  'bin',
  'pkg',
  'vendor/bundle',
  '.bundle',
  'Debug',
  'Release',
  'cmake-build-debug',
  '.gradle',
  'coverage',
  'logs',

  // === Python Caches ===
  '__pycache__',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',

  // === Editors & OS ===
  '.vs',
  '.vscode',
  '.idea',
  '.classpath',
  '.project',
  '.DS_Store',
  '__MACOSX',

  // === Local Environment ===
  '.env',
  'docker-compose.override.yml',
  '.dockerignore',
];

/**
 * Parse ignore file content into unique patterns, skipping blank lines and
 * `#` comments.
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'));
  return Array.from(new Set(patterns));
}

/**
 * Load patterns from a newline-delimited file. A missing or unreadable file
 * means "ignore nothing".
 */
export async function loadIgnorePatterns(ignoreFilePath: string, logger: Logger): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(ignoreFilePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      logger.warn(`Failed to load ignore file: ${ignoreFilePath}`);
    } else {
      logger.warn(`Error reading ignore file: ${ignoreFilePath}`, { error });
    }
    return [];
  }

  const patterns = parseIgnoreFile(content);
  logger.debug(`Loaded ${patterns.length} patterns from ${path.basename(ignoreFilePath)}`);
  return patterns;
}

/**
 * Collect every configured pattern source for a root: the ignore file,
 * optionally .gitignore, optionally the built-in list.
 */
export async function loadIgnoreSources(
  rootDir: string,
  settings: Pick<SnapshotSettings, 'ignoreFile' | 'includeGitignore' | 'useDefaultExcludes'>,
  logger: Logger
): Promise<string[]> {
  const patterns: string[] = [];

  if (settings.useDefaultExcludes) {
    patterns.push(...DEFAULT_EXCLUDES);
  }

  patterns.push(...await loadIgnorePatterns(path.resolve(rootDir, settings.ignoreFile), logger));

  if (settings.includeGitignore) {
    const gitignore = await loadIgnorePatterns(path.join(rootDir, '.gitignore'), logger);
    // .gitignore directory markers ("build/") would never match a base name
    patterns.push(...gitignore.map(p => (p.length > 1 && p.endsWith('/') ? p.slice(0, -1) : p)));
  }

  const unique = Array.from(new Set(patterns));
  logger.debug(`Total ignore patterns loaded: ${unique.length}`);
  return unique;
}

/**
 * Decide whether a path is excluded.
 *
 * @param entryPath - path as seen by the walk (relative to the snapshot root)
 */
export function shouldIgnore(entryPath: string, patterns: readonly string[]): boolean {
  const baseName = path.basename(entryPath);

  for (const pattern of patterns) {
    if (matchesBaseName(baseName, pattern)) {
      return true;
    }
    if (entryPath.startsWith(pattern)) {
      return true;
    }
  }
  return false;
}

function matchesBaseName(baseName: string, pattern: string): boolean {
  try {
    return minimatch(baseName, pattern, { dot: true, nonegate: true, nocomment: true });
  } catch {
    // Malformed glob: fall back to the prefix rule only
    return false;
  }
}
