import { existsSync } from 'node:fs';
import chalk from 'chalk';
import { loadConfig } from '../../config/config.js';
import { errorMessage } from '../../utils/errors.js';
import { requireRepository, databasePath, openDatabase, type OutputFormat } from './shared.js';

export interface QueryOptions {
  cwd?: string;
  format?: OutputFormat;
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export async function queryCommand(sql: string, opts: QueryOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const repo = await requireRepository(cwd);
  const root = repo.root;
  repo.close();

  const config = await loadConfig(root);
  if (!existsSync(databasePath(root, config))) {
    console.error(chalk.red('Error: No docmodel database found. Run `docmodel init` first.'));
    process.exit(1);
  }

  const db = openDatabase(root, config);

  try {
    const results = db.query(sql).filter(isRow);

    if (opts.format === 'json') {
      console.log(JSON.stringify(results, null, 2));
    } else if (results.length === 0) {
      console.log(chalk.dim('No results.'));
    } else {
      const columns = Object.keys(results[0]);
      const header = columns.map(c => c.padEnd(20)).join(' │ ');
      console.log(chalk.bold(header));
      console.log('─'.repeat(header.length));

      for (const row of results) {
        const line = columns.map(c => String(row[c] ?? '').slice(0, 20).padEnd(20)).join(' │ ');
        console.log(line);
      }

      console.log(chalk.dim(`\n${results.length} row${results.length !== 1 ? 's' : ''}`));
    }
  } catch (err) {
    console.error(chalk.red(`SQL Error: ${errorMessage(err)}`));
    process.exit(1);
  } finally {
    db.close();
  }
}
