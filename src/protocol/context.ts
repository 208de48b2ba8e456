import type { CodebaseContext, Snapshot } from '../snapshot/types.js';

/**
 * Holds the codebase context for one session. The snapshot and notes are
 * fixed at construction; file contents only ever grow, and a path already
 * present is never overwritten.
 */
export class CodebaseContextStore {
  private readonly snapshot: Snapshot;
  private readonly notes: readonly string[];
  private readonly fileContents = new Map<string, string>();

  constructor(snapshot: Snapshot, notes: readonly string[] = []) {
    this.snapshot = snapshot;
    this.notes = [...notes];
  }

  /** Returns false when content for `path` was already recorded */
  addFileContent(path: string, content: string): boolean {
    if (this.fileContents.has(path)) {
      return false;
    }
    this.fileContents.set(path, content);
    return true;
  }

  hasFileContent(path: string): boolean {
    return this.fileContents.has(path);
  }

  getFileContent(path: string): string | undefined {
    return this.fileContents.get(path);
  }

  get fileCount(): number {
    return this.fileContents.size;
  }

  /** Plain copy suitable for a request envelope */
  toContext(): CodebaseContext {
    return {
      snapshot: this.snapshot,
      notes: [...this.notes],
      fileContents: Object.fromEntries(this.fileContents),
    };
  }
}
