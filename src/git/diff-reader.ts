import type { RawCommit, RawPerson, TreeDiffEntry, EditSpan } from './types.js';
import { createContextLogger } from '../utils/logger.js';

const log = createContextLogger('diff-reader');

export const RECORD_SEPARATOR = '\x1e';
export const FIELD_SEPARATOR = '\x1f';

/** `git log --format` producing one record per commit, fields unit-separated. */
export const LOG_FORMAT = RECORD_SEPARATOR + [
  '%H', '%T', '%P',
  '%an', '%ae', '%aI',
  '%cn', '%ce', '%cI',
  '%B',
].join(FIELD_SEPARATOR);

const LOG_FIELD_COUNT = 10;

export function parseLogOutput(output: string): RawCommit[] {
  const commits: RawCommit[] = [];

  for (const record of output.split(RECORD_SEPARATOR)) {
    if (!record.trim()) continue;

    const fields = record.split(FIELD_SEPARATOR);
    if (fields.length < LOG_FIELD_COUNT) {
      log.warn('Skipping malformed log record', { record: record.slice(0, 80) });
      continue;
    }

    const [hash, tree, parents, authorName, authorEmail, authorDate, committerName, committerEmail, committerDate] = fields;
    commits.push({
      hash: hash.trim(),
      tree: tree.trim(),
      parents: parents.split(' ').filter(Boolean),
      author: person(authorName, authorEmail, authorDate),
      committer: person(committerName, committerEmail, committerDate),
      // git terminates each record with a newline after the body
      message: fields.slice(LOG_FIELD_COUNT - 1).join(FIELD_SEPARATOR).replace(/\n+$/, ''),
    });
  }

  return commits;
}

function person(name: string, email: string, date: string): RawPerson {
  return { name, email, timestamp: new Date(date.trim()) };
}

/** Parses `git diff --name-status` output (with or without `-M -C`). */
export function parseNameStatus(output: string): TreeDiffEntry[] {
  const entries: TreeDiffEntry[] = [];

  for (const line of output.split('\n').filter(Boolean)) {
    const parts = line.split('\t').map(unquotePath);
    const statusCode = parts[0].trim();

    if (statusCode === 'A') {
      entries.push({ kind: 'add', newPath: parts[1] });
    } else if (statusCode === 'D') {
      entries.push({ kind: 'delete', oldPath: parts[1] });
    } else if (statusCode === 'M' || statusCode === 'T') {
      entries.push({ kind: 'modify', oldPath: parts[1], newPath: parts[1] });
    } else if (statusCode.startsWith('R')) {
      entries.push({ kind: 'rename', oldPath: parts[1], newPath: parts[2] });
    } else if (statusCode.startsWith('C')) {
      entries.push({ kind: 'copy', oldPath: parts[1], newPath: parts[2] });
    } else {
      log.debug(`Ignoring diff status ${statusCode}`, { line });
    }
  }

  return entries;
}

/** Per-file result of a zero-context patch. */
export interface PatchFile {
  binary: boolean;
  spans: EditSpan[];
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DEV_NULL = '/dev/null';

interface PatchSection {
  header?: string;
  minus?: string;
  plus?: string;
  renameTo?: string;
  inHunks: boolean;
  file: PatchFile;
}

/**
 * Splits `git diff -U0` output into edit spans keyed by path: the new path,
 * or the old path for deletions.
 */
export function parseUnifiedDiff(output: string): Map<string, PatchFile> {
  const files = new Map<string, PatchFile>();
  let section: PatchSection | undefined;

  const flush = (): void => {
    if (!section) return;
    const key = sectionPath(section);
    if (key) files.set(key, section.file);
  };

  for (const line of output.split('\n')) {
    if (line.startsWith('diff --git ')) {
      flush();
      const header = /^diff --git a\/(.+) b\/(.+)$/.exec(line);
      section = { header: header?.[2], inHunks: false, file: { binary: false, spans: [] } };
      continue;
    }
    if (!section) continue;

    const hunk = HUNK_HEADER.exec(line);
    if (hunk) {
      section.inHunks = true;
      section.file.spans.push(spanOf(hunk));
      continue;
    }
    if (section.inHunks) continue;

    if (line.startsWith('--- ')) {
      section.minus = stripPrefix(line.slice(4), 'a/');
    } else if (line.startsWith('+++ ')) {
      section.plus = stripPrefix(line.slice(4), 'b/');
    } else if (line.startsWith('rename to ') || line.startsWith('copy to ')) {
      section.renameTo = unquotePath(line.slice(line.indexOf(' to ') + 4));
    } else if (line.startsWith('Binary files ') || line === 'GIT binary patch') {
      section.file.binary = true;
    }
  }
  flush();

  return files;
}

function sectionPath(section: PatchSection): string | undefined {
  if (section.plus && section.plus !== DEV_NULL) return section.plus;
  if (section.minus && section.minus !== DEV_NULL) return section.minus;
  return section.renameTo ?? section.header;
}

function spanOf(hunk: RegExpExecArray): EditSpan {
  const oldLine = Number(hunk[1]);
  const oldCount = hunk[2] === undefined ? 1 : Number(hunk[2]);
  const newLine = Number(hunk[3]);
  const newCount = hunk[4] === undefined ? 1 : Number(hunk[4]);

  // An empty side names the line before the edit rather than its first line
  const oldStart = oldCount === 0 ? oldLine : oldLine - 1;
  const newStart = newCount === 0 ? newLine : newLine - 1;
  return {
    oldStart,
    oldEnd: oldStart + oldCount,
    newStart,
    newEnd: newStart + newCount,
  };
}

function stripPrefix(raw: string, prefix: string): string {
  // git appends a tab to ---/+++ names containing spaces
  const path = unquotePath(raw.replace(/\t$/, ''));
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', '"': '"', '\\': '\\' };

/** Undoes git's C-style quoting of unusual path names. */
export function unquotePath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return raw;
  }
  return raw.slice(1, -1).replace(/\\(.)/g, (match: string, ch: string) => ESCAPES[ch] ?? match);
}
