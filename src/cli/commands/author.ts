import chalk from 'chalk';
import { loadConfig } from '../../config/config.js';
import { commitsByAuthor } from '../../git/history.js';
import { lineTotals } from '../../analysis/stats.js';
import { formatCommits } from '../formatters/terminal.js';
import { formatCommitsJson } from '../formatters/json.js';
import { requireRepository, type OutputFormat } from './shared.js';

export interface AuthorOptions {
  cwd?: string;
  format?: OutputFormat;
  count?: number;
}

export async function authorCommand(query: string, opts: AuthorOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const repo = await requireRepository(cwd);

  try {
    const config = await loadConfig(repo.root);
    const commits = await commitsByAuthor(repo, query, {
      limit: opts.count ?? 0,
      detectRenames: config.detectRenames,
      allRefs: config.allBranches,
    });

    if (opts.format === 'json') {
      console.log(formatCommitsJson(commits));
      return;
    }

    const totals = lineTotals(commits);
    console.log(
      chalk.bold(`Commits matching "${query}"`)
      + chalk.dim(` (${commits.length} commits, +${totals.added} -${totals.deleted})`),
    );
    console.log('');
    console.log(formatCommits(commits));
  } finally {
    repo.close();
  }
}
