/**
 * One filesystem entry in a codebase snapshot.
 *
 * A node is either a directory (`children`, never `identifiers`) or a file
 * (`identifiers`, never `children`). Excluded entries are bare markers:
 * an excluded directory has no `children`, an excluded file no `identifiers`.
 */
export interface SnapshotNode {
  isDirectory: boolean;
  excluded: boolean;
  children?: Record<string, SnapshotNode>;
  identifiers?: string[];
}

/** Snapshot keyed by the absolute root path that was walked */
export type Snapshot = Record<string, SnapshotNode>;

/** The unit of knowledge shared with the remote side */
export interface CodebaseContext {
  snapshot: Snapshot;
  /** Human-readable caveats about the snapshot */
  notes: string[];
  /** Full text of files the model needs verbatim, keyed by path relative to the root */
  fileContents: Record<string, string>;
}

export interface BuildStats {
  files: number;
  directories: number;
  excluded: number;
  /** Files kept with no identifiers because no grammar applied or parsing failed */
  extractionFailures: number;
  /** Files over the size limit, kept with no identifiers */
  oversized: number;
  /** Entries that could not be read or are not regular files/directories */
  skipped: number;
  durationMs: number;
}

export interface SnapshotResult {
  snapshot: Snapshot;
  notes: string[];
  stats: BuildStats;
}
