import type { SourceFile } from '../../model/source-file.js';
import type { Commit } from '../../model/commit.js';
import type { AnalysisSummary } from '../../parser/analyzer.js';
import type { HistorySummary } from '../../analysis/stats.js';

export function formatAnalysisJson(files: SourceFile[], summary: AnalysisSummary): string {
  return JSON.stringify({ summary, files }, null, 2);
}

export function formatCommitsJson(commits: Commit[]): string {
  return JSON.stringify({
    count: commits.length,
    commits: commits.map(c => ({
      hash: c.hash,
      shortHash: c.shortHash,
      author: c.author,
      committer: c.committer,
      subject: c.subject,
      message: c.message,
      parentHashes: c.parentHashes,
      isMerge: c.isMerge,
      fileChanges: c.fileChanges,
    })),
  }, null, 2);
}

export function formatSummaryJson(projectName: string, analysis: AnalysisSummary, history: HistorySummary): string {
  return JSON.stringify({ projectName, analysis, history }, null, 2);
}
