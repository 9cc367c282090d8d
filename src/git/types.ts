import type { FileChangeKind } from '../model/commit.js';

export interface RawPerson {
  name: string;
  email: string;
  timestamp: Date;
}

/** A commit as read from the object store, before any diffing. */
export interface RawCommit {
  hash: string;
  tree: string;
  /** Ordered; the first entry is the first parent */
  parents: string[];
  author: RawPerson;
  committer: RawPerson;
  message: string;
}

export type TreeRef =
  | { type: 'empty' }                 // Root-commit baseline
  | { type: 'commit'; hash: string };

export interface TreeDiffEntry {
  kind: FileChangeKind;
  /** Absent for additions */
  oldPath?: string;
  /** Absent for deletions */
  newPath?: string;
}

/** Half-open line ranges `[oldStart, oldEnd)` and `[newStart, newEnd)`. */
export interface EditSpan {
  oldStart: number;
  oldEnd: number;
  newStart: number;
  newEnd: number;
}

export interface WalkOptions {
  /** 0 or absent means unlimited */
  maxCount?: number;
  /** Restrict to commits touching this path */
  path?: string;
  /** Walk every ref instead of HEAD only */
  allRefs?: boolean;
}

export interface DiffFormatterOptions {
  detectRenames?: boolean;
}

export interface DiffFormatter {
  scan(oldTree: TreeRef, newTree: TreeRef): Promise<TreeDiffEntry[]>;
  /** Edit spans for an entry of the last scan; rejects on binary content. */
  editList(entry: TreeDiffEntry): Promise<EditSpan[]>;
  close(): void;
}

export interface RepositoryHandle {
  readonly root: string;
  readonly closed: boolean;
  walkCommits(options?: WalkOptions): Promise<RawCommit[]>;
  newDiffFormatter(options?: DiffFormatterOptions): DiffFormatter;
  close(): void;
}
