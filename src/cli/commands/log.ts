import chalk from 'chalk';
import { loadConfig } from '../../config/config.js';
import { extractHistory } from '../../git/history.js';
import { formatCommits } from '../formatters/terminal.js';
import { formatCommitsJson } from '../formatters/json.js';
import { requireRepository, openDatabase, type OutputFormat } from './shared.js';

export interface LogOptions {
  cwd?: string;
  format?: OutputFormat;
  count?: number;
  store?: boolean;
  renames?: boolean;
}

export async function logCommand(opts: LogOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const repo = await requireRepository(cwd);

  try {
    const config = await loadConfig(repo.root, { detectRenames: opts.renames });
    const commits = await extractHistory(repo, {
      limit: opts.count ?? config.maxCommits,
      detectRenames: config.detectRenames,
      allRefs: config.allBranches,
    });

    if (opts.store) {
      const db = openDatabase(repo.root, config);
      db.insertCommits(commits);
      db.close();
    }

    if (opts.format === 'json') {
      console.log(formatCommitsJson(commits));
    } else {
      console.log(formatCommits(commits));
      if (opts.store) {
        console.log(chalk.dim(`Stored ${commits.length} commits in ${config.database}`));
      }
    }
  } finally {
    repo.close();
  }
}
