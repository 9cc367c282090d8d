import { fileNameOf, getExtension } from '../utils/path.js';

export type FileChangeKind = 'add' | 'modify' | 'delete' | 'rename' | 'copy';

export interface FileChange {
  /** New-side path, or the old-side path for deletions */
  path: string;
  /** Only set for renames and copies */
  oldPath?: string;
  kind: FileChangeKind;
  linesAdded: number;
  linesDeleted: number;
}

export interface PersonIdent {
  name: string;
  email: string;
  timestamp: Date;
}

export interface Commit {
  hash: string;
  /** First 7 characters of the hash; undefined when the hash is shorter */
  shortHash?: string;
  author: PersonIdent;
  committer: PersonIdent;
  subject: string;
  message: string;
  parentHashes: string[];
  isMerge: boolean;
  fileChanges: FileChange[];
}

export interface CommitInit {
  hash: string;
  author: PersonIdent;
  committer: PersonIdent;
  message: string;
  parentHashes: string[];
  fileChanges: FileChange[];
}

const SHORT_HASH_LENGTH = 7;

export function shortHashOf(hash: string): string | undefined {
  return hash.length >= SHORT_HASH_LENGTH ? hash.slice(0, SHORT_HASH_LENGTH) : undefined;
}

export function subjectOf(message: string): string {
  const newline = message.indexOf('\n');
  return (newline >= 0 ? message.slice(0, newline) : message).trim();
}

export function createCommit(init: CommitInit): Commit {
  return {
    hash: init.hash,
    shortHash: shortHashOf(init.hash),
    author: init.author,
    committer: init.committer,
    subject: subjectOf(init.message),
    message: init.message,
    parentHashes: [...init.parentHashes],
    isMerge: init.parentHashes.length > 1,
    fileChanges: init.fileChanges,
  };
}

export function totalLinesAdded(commit: Commit): number {
  return commit.fileChanges.reduce((sum, c) => sum + c.linesAdded, 0);
}

export function totalLinesDeleted(commit: Commit): number {
  return commit.fileChanges.reduce((sum, c) => sum + c.linesDeleted, 0);
}

export function changesOfKind(commit: Commit, kind: FileChangeKind): FileChange[] {
  return commit.fileChanges.filter(c => c.kind === kind);
}

export function touchesPath(commit: Commit, path: string): boolean {
  return commit.fileChanges.some(c => c.path === path);
}

export function authorLabel(person: PersonIdent): string {
  return person.email ? `${person.name} <${person.email}>` : person.name;
}

export function changeFileName(change: FileChange): string {
  return fileNameOf(change.path);
}

export function isSourceFile(change: FileChange, extension = '.java'): boolean {
  return getExtension(change.path) === extension;
}
