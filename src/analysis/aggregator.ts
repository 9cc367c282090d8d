import type { Commit } from '../model/commit.js';
import type { SourceFile } from '../model/source-file.js';
import { fileNameOf } from '../utils/path.js';

export interface FileHistory {
  file: SourceFile;
  commits: Commit[];
}

/**
 * Loose match between a source path and a changed path: same file name, or
 * one path is a prefix or suffix of the other. Files sharing a name in
 * different directories match each other.
 */
export function pathsMatch(filePath: string, changePath: string): boolean {
  const a = filePath.replace(/\\/g, '/');
  const b = changePath.replace(/\\/g, '/');
  return fileNameOf(a) === fileNameOf(b)
    || a.endsWith(b) || b.endsWith(a)
    || a.startsWith(b) || b.startsWith(a);
}

export function commitsForFile(filePath: string, commits: Commit[]): Commit[] {
  return commits.filter(commit => commit.fileChanges.some(change => pathsMatch(filePath, change.path)));
}

export function joinHistory(files: SourceFile[], commits: Commit[]): FileHistory[] {
  return files.map(file => ({ file, commits: commitsForFile(file.path, commits) }));
}
