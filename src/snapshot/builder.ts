/**
 * Snapshot Builder
 *
 * Walks a root directory once, depth-first and in lexical order, and
 * assembles the snapshot tree:
 * - ignored entries become `excluded` markers and directories among them are
 *   not descended into
 * - included files carry the identifiers extracted from their source
 * - anything that fails below the root is logged and absorbed
 *
 * Only an unreadable root aborts the build.
 */

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import { SnapshotError, errnoCode, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { DEFAULT_MAX_FILE_BYTES } from '../config/settings.js';
import type { IdentifierExtractor } from './extractor.js';
import { shouldIgnore } from './ignore.js';
import type { BuildStats, SnapshotNode, SnapshotResult } from './types.js';

export const NOTE_EXCLUDED_ENTRIES = 'excluded entries exist but are not expanded';

export interface SnapshotBuilderOptions {
  extractor: IdentifierExtractor;
  logger: Logger;
  maxFileBytes?: number;
}

interface DirectoryNode extends SnapshotNode {
  isDirectory: true;
  children: Record<string, SnapshotNode>;
}

function newDirectory(): DirectoryNode {
  return { isDirectory: true, excluded: false, children: {} };
}

function isDirectoryNode(node: SnapshotNode | undefined): node is DirectoryNode {
  return node !== undefined && node.isDirectory && !node.excluded && node.children !== undefined;
}

/** Mutable state of one build; a builder instance can serve several builds */
interface BuildState {
  absoluteRoot: string;
  root: DirectoryNode;
  ignorePatterns: readonly string[];
  stats: BuildStats;
}

export class SnapshotBuilder {
  private readonly extractor: IdentifierExtractor;
  private readonly logger: Logger;
  private readonly maxFileBytes: number;

  constructor(options: SnapshotBuilderOptions) {
    this.extractor = options.extractor;
    this.logger = options.logger.child('SnapshotBuilder');
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  }

  /**
   * Build the snapshot of `rootDir`, keyed by its absolute path.
   *
   * @throws SnapshotError when the root itself cannot be read
   */
  async build(rootDir: string, ignorePatterns: readonly string[]): Promise<SnapshotResult> {
    const startTime = Date.now();
    const absoluteRoot = path.resolve(rootDir);

    let rootEntries: Dirent[];
    try {
      const rootStat = await fs.stat(absoluteRoot);
      if (!rootStat.isDirectory()) {
        throw new Error('not a directory');
      }
      rootEntries = await readSortedEntries(absoluteRoot);
    } catch (error) {
      throw new SnapshotError(absoluteRoot, error);
    }

    const state: BuildState = {
      absoluteRoot,
      root: newDirectory(),
      ignorePatterns,
      stats: {
        files: 0,
        directories: 0,
        excluded: 0,
        extractionFailures: 0,
        oversized: 0,
        skipped: 0,
        durationMs: 0,
      },
    };

    await this.visitEntries(state, absoluteRoot, rootEntries);

    const { stats } = state;
    stats.durationMs = Date.now() - startTime;
    this.logger.info(`Snapshot built: ${stats.files} files, ${stats.directories} directories, ${stats.excluded} excluded`, {
      root: absoluteRoot,
      elapsed_ms: stats.durationMs,
    });

    return {
      snapshot: { [absoluteRoot]: deepFreeze(state.root) },
      notes: buildNotes(stats),
      stats,
    };
  }

  private async visitEntries(state: BuildState, dirPath: string, entries: Dirent[]): Promise<void> {
    for (const entry of entries) {
      await this.visit(state, path.join(dirPath, entry.name), entry);
    }
  }

  private async visit(state: BuildState, absolutePath: string, entry: Dirent): Promise<void> {
    const { stats } = state;
    const relativePath = path.relative(state.absoluteRoot, absolutePath);
    const parts = relativePath.split(path.sep);
    const name = parts[parts.length - 1];
    const parent = ensureDirectory(state.root, parts.slice(0, -1));

    if (!parent) {
      // An ancestor was recorded as something other than an open directory
      stats.skipped++;
      this.logger.warn(`Skipping entry under a non-directory node: ${relativePath}`);
      return;
    }

    const isDirectory = entry.isDirectory();

    if (shouldIgnore(relativePath, state.ignorePatterns)) {
      stats.excluded++;
      parent.children[name] = { isDirectory, excluded: true };
      this.logger.debug(`Skipping ignored path: ${relativePath}`);
      return;
    }

    if (isDirectory) {
      const existing = parent.children[name];
      // A directory may already exist when a deeper entry referenced it first
      parent.children[name] = isDirectoryNode(existing) ? existing : newDirectory();
      stats.directories++;

      let entries: Dirent[];
      try {
        entries = await readSortedEntries(absolutePath);
      } catch (error) {
        stats.skipped++;
        this.logger.warn(`Error reading directory ${relativePath}`, { code: errnoCode(error), error: errorMessage(error) });
        return;
      }
      await this.visitEntries(state, absolutePath, entries);
      return;
    }

    if (!entry.isFile() && !entry.isSymbolicLink()) {
      stats.skipped++;
      this.logger.debug(`Skipping special file: ${relativePath}`);
      return;
    }

    parent.children[name] = await this.describeFile(absolutePath, relativePath, stats);
    stats.files++;
    this.logger.trace('Added to tree', { path: relativePath });
  }

  private async describeFile(absolutePath: string, relativePath: string, stats: BuildStats): Promise<SnapshotNode> {
    const emptyFile: SnapshotNode = { isDirectory: false, excluded: false, identifiers: [] };

    let source: string;
    try {
      const fileStat = await fs.stat(absolutePath);
      if (fileStat.size > this.maxFileBytes) {
        stats.oversized++;
        this.logger.debug(`Skipping large file: ${relativePath} (${(fileStat.size / 1024 / 1024).toFixed(2)}MB)`);
        return emptyFile;
      }
      source = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
      stats.extractionFailures++;
      this.logger.debug(`Failed to read file: ${relativePath}`, { error: errorMessage(error) });
      return emptyFile;
    }

    const result = await this.extractor.extract(relativePath, source);
    switch (result.kind) {
      case 'extracted':
        this.logger.trace('Parsed', { path: relativePath, grammar: result.grammar });
        return { isDirectory: false, excluded: false, identifiers: result.identifiers };
      case 'unsupported':
        stats.extractionFailures++;
        this.logger.trace(`Failed to parse file: ${relativePath}`, { reason: `unsupported file: ${result.extension || 'no extension'}` });
        return emptyFile;
      case 'failed':
        stats.extractionFailures++;
        this.logger.debug(`Failed to parse file: ${relativePath}`, { grammar: result.grammar, error: result.error });
        return emptyFile;
    }
  }
}

/**
 * Walk down to the directory node for `segments`, creating any that are
 * missing. Returns undefined when a segment names a file or excluded entry.
 */
function ensureDirectory(root: DirectoryNode, segments: string[]): DirectoryNode | undefined {
  let node = root;
  for (const segment of segments) {
    const child = node.children[segment];
    if (child === undefined) {
      const created = newDirectory();
      node.children[segment] = created;
      node = created;
      continue;
    }
    if (!isDirectoryNode(child)) {
      return undefined;
    }
    node = child;
  }
  return node;
}

async function readSortedEntries(dirPath: string): Promise<Dirent[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

function buildNotes(stats: BuildStats): string[] {
  const notes: string[] = [];
  if (stats.excluded > 0) {
    notes.push(NOTE_EXCLUDED_ENTRIES);
  }
  if (stats.extractionFailures > 0) {
    notes.push(`${stats.extractionFailures} files have no identifiers because no grammar applied or parsing failed`);
  }
  if (stats.oversized > 0) {
    notes.push(`${stats.oversized} files exceed the size limit and have no identifiers`);
  }
  return notes;
}

function deepFreeze<T extends SnapshotNode>(node: T): T {
  if (node.children) {
    for (const child of Object.values(node.children)) {
      deepFreeze(child);
    }
    Object.freeze(node.children);
  }
  if (node.identifiers) {
    Object.freeze(node.identifiers);
  }
  return Object.freeze(node);
}
