import { resolve } from 'node:path';
import chalk from 'chalk';
import { loadConfig } from '../../config/config.js';
import { commitsForPath } from '../../git/history.js';
import { normalizeFilePath } from '../../utils/path.js';
import { formatCommits } from '../formatters/terminal.js';
import { formatCommitsJson } from '../formatters/json.js';
import { requireRepository, type OutputFormat } from './shared.js';

export interface FileHistoryOptions {
  cwd?: string;
  format?: OutputFormat;
  count?: number;
}

export async function historyCommand(file: string, opts: FileHistoryOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const repo = await requireRepository(cwd);

  try {
    const config = await loadConfig(repo.root);
    const path = normalizeFilePath(resolve(cwd, file), repo.root);
    const commits = await commitsForPath(repo, path, {
      limit: opts.count ?? 0,
      detectRenames: config.detectRenames,
    });

    if (opts.format === 'json') {
      console.log(formatCommitsJson(commits));
      return;
    }

    console.log(chalk.bold(`History of ${path}`) + chalk.dim(` (${commits.length} commits)`));
    console.log('');
    console.log(formatCommits(commits));
  } finally {
    repo.close();
  }
}
