import type { Commit } from '../model/commit.js';
import { totalLinesAdded, totalLinesDeleted } from '../model/commit.js';

export interface RankedEntry {
  key: string;
  count: number;
}

export interface LineTotals {
  added: number;
  deleted: number;
}

export interface HistorySummary {
  totalCommits: number;
  /** Oldest and newest author dates; absent for an empty history */
  firstCommit?: Date;
  lastCommit?: Date;
  authorCount: number;
  topContributors: RankedEntry[];
  mostChangedFiles: RankedEntry[];
  lines: LineTotals;
}

const TOP_N = 5;

/** Commits per author name. */
export function authorCommitCounts(commits: Commit[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const commit of commits) {
    counts.set(commit.author.name, (counts.get(commit.author.name) ?? 0) + 1);
  }
  return counts;
}

/** Number of changes recorded per path. */
export function fileChangeCounts(commits: Commit[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const commit of commits) {
    for (const change of commit.fileChanges) {
      counts.set(change.path, (counts.get(change.path) ?? 0) + 1);
    }
  }
  return counts;
}

/** Count descending, then key ascending. */
export function rank(counts: Map<string, number>, limit = 0): RankedEntry[] {
  const ranked = Array.from(counts, ([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  return limit > 0 ? ranked.slice(0, limit) : ranked;
}

export function mostChangedFiles(commits: Commit[], limit = 10): RankedEntry[] {
  return rank(fileChangeCounts(commits), limit);
}

export function lineTotals(commits: Commit[]): LineTotals {
  let added = 0;
  let deleted = 0;
  for (const commit of commits) {
    added += totalLinesAdded(commit);
    deleted += totalLinesDeleted(commit);
  }
  return { added, deleted };
}

export function summarizeHistory(commits: Commit[]): HistorySummary {
  const authors = authorCommitCounts(commits);
  let first: Date | undefined;
  let last: Date | undefined;
  for (const { author } of commits) {
    if (!first || author.timestamp < first) first = author.timestamp;
    if (!last || author.timestamp > last) last = author.timestamp;
  }

  return {
    totalCommits: commits.length,
    firstCommit: first,
    lastCommit: last,
    authorCount: authors.size,
    topContributors: rank(authors, TOP_N),
    mostChangedFiles: mostChangedFiles(commits, TOP_N),
    lines: lineTotals(commits),
  };
}
