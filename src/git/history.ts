import type { Commit, FileChange } from '../model/commit.js';
import { createCommit } from '../model/commit.js';
import type { RawCommit, RepositoryHandle, TreeRef, TreeDiffEntry, DiffFormatter } from './types.js';
import { GitBridge } from './bridge.js';
import { DocModelError, RepositoryClosedError, errorMessage } from '../utils/errors.js';
import { createContextLogger } from '../utils/logger.js';

const log = createContextLogger('history');

export interface HistoryOptions {
  /** Maximum commits to return; 0 means unlimited */
  limit?: number;
  detectRenames?: boolean;
  /** Walk every ref rather than HEAD only */
  allRefs?: boolean;
}

export interface DiffOptions {
  detectRenames?: boolean;
}

export type RepositoryConnection =
  | { connected: true; repository: GitBridge }
  | { connected: false; error: string };

/** Full history, newest first in walk order, every commit diffed against its first parent. */
export async function extractHistory(repo: RepositoryHandle, options: HistoryOptions = {}): Promise<Commit[]> {
  ensureOpen(repo);
  const raw = await repo.walkCommits({
    maxCount: options.limit ?? 0,
    allRefs: options.allRefs ?? true,
  });
  log.debug(`Walked ${raw.length} commits in ${repo.root}`);
  return buildCommits(repo, raw, options);
}

/** Commits touching `path`, walked from HEAD. */
export async function commitsForPath(
  repo: RepositoryHandle,
  path: string,
  options: HistoryOptions = {},
): Promise<Commit[]> {
  ensureOpen(repo);
  const raw = await repo.walkCommits({ maxCount: options.limit ?? 0, path });
  return buildCommits(repo, raw, options);
}

/**
 * Commits whose author name or email contains `query`, filtered from the
 * whole unrestricted history.
 */
export async function commitsByAuthor(
  repo: RepositoryHandle,
  query: string,
  options: HistoryOptions = {},
): Promise<Commit[]> {
  const all = await extractHistory(repo, { ...options, limit: 0 });
  const matches = all.filter(c => c.author.name.includes(query) || c.author.email.includes(query));
  const limit = options.limit ?? 0;
  return limit > 0 ? matches.slice(0, limit) : matches;
}

async function buildCommits(repo: RepositoryHandle, raw: RawCommit[], options: DiffOptions): Promise<Commit[]> {
  const commits: Commit[] = [];
  // Sequential: every diff goes through the same git handle
  for (const entry of raw) {
    commits.push(createCommit({
      hash: entry.hash,
      author: entry.author,
      committer: entry.committer,
      message: entry.message,
      parentHashes: entry.parents,
      fileChanges: await computeFileChanges(repo, entry, options),
    }));
  }
  return commits;
}

/**
 * Diffs a commit against its first parent, or against the empty tree when it
 * has none. The formatter is released whatever happens.
 */
export async function computeFileChanges(
  repo: RepositoryHandle,
  commit: RawCommit,
  options: DiffOptions = {},
): Promise<FileChange[]> {
  ensureOpen(repo);
  const baseline: TreeRef = commit.parents.length > 0
    ? { type: 'commit', hash: commit.parents[0] }
    : { type: 'empty' };

  const formatter = repo.newDiffFormatter({ detectRenames: options.detectRenames ?? true });
  try {
    const entries = await formatter.scan(baseline, { type: 'commit', hash: commit.hash });
    const changes: FileChange[] = [];
    for (const entry of entries) {
      changes.push(await toFileChange(formatter, entry, commit.hash));
    }
    return changes;
  } finally {
    formatter.close();
  }
}

async function toFileChange(formatter: DiffFormatter, entry: TreeDiffEntry, hash: string): Promise<FileChange> {
  const path = entry.kind === 'delete' ? entry.oldPath : entry.newPath;
  const change: FileChange = {
    path: path ?? '',
    kind: entry.kind,
    linesAdded: 0,
    linesDeleted: 0,
  };
  if (entry.kind === 'rename' || entry.kind === 'copy') {
    change.oldPath = entry.oldPath;
  }

  try {
    for (const span of await formatter.editList(entry)) {
      change.linesAdded += span.newEnd - span.newStart;
      change.linesDeleted += span.oldEnd - span.oldStart;
    }
  } catch (err) {
    log.warn(`Line counts unavailable for ${change.path} in ${hash}`, { error: errorMessage(err) });
    change.linesAdded = 0;
    change.linesDeleted = 0;
  }

  return change;
}

function ensureOpen(repo: RepositoryHandle): void {
  if (repo.closed) {
    throw new RepositoryClosedError(repo.root);
  }
}

/** Opens the repository containing `path`; failure is reported, not thrown. */
export async function openRepository(path: string): Promise<RepositoryConnection> {
  let probe: GitBridge | undefined;
  try {
    // simple-git refuses a missing base directory from its constructor
    probe = new GitBridge(path);
    if (!(await probe.isRepo())) {
      return { connected: false, error: `Could not open repository: ${path} is not inside a Git work tree` };
    }
    const root = await probe.getRepoRoot();
    log.debug(`Connected to Git repository at ${root}`);
    return { connected: true, repository: new GitBridge(root) };
  } catch (err) {
    return { connected: false, error: `Could not open repository: ${errorMessage(err)}` };
  } finally {
    probe?.close();
  }
}

/** Opens, runs `fn` and closes the repository even when `fn` fails. */
export async function withRepository<T>(path: string, fn: (repo: GitBridge) => Promise<T>): Promise<T> {
  const connection = await openRepository(path);
  if (!connection.connected) {
    throw new DocModelError(connection.error, { path });
  }
  try {
    return await fn(connection.repository);
  } finally {
    connection.repository.close();
  }
}
