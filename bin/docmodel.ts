#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { initCommand } from '../src/cli/commands/init.js';
import { analyzeCommand } from '../src/cli/commands/analyze.js';
import { logCommand } from '../src/cli/commands/log.js';
import { historyCommand } from '../src/cli/commands/history.js';
import { authorCommand } from '../src/cli/commands/author.js';
import { summaryCommand } from '../src/cli/commands/summary.js';
import { queryCommand } from '../src/cli/commands/query.js';
import { setLogLevel } from '../src/utils/logger.js';
import { errorMessage } from '../src/utils/errors.js';

function parseCount(value: string): number {
  const count = parseInt(value, 10);
  return Number.isNaN(count) || count < 0 ? 0 : count;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('docmodel')
  .description('Documentation data model for Java repositories: type structure and Git history')
  .version('0.1.0')
  .option('-v, --verbose', 'Log progress to stderr')
  .hook('preAction', (command) => {
    if (command.opts().verbose) {
      setLogLevel('debug');
    }
  });

program
  .command('init')
  .description('Write a default .docmodel.yml and create the database')
  .action(async () => {
    await initCommand();
  });

program
  .command('analyze')
  .description('Extract type declarations from every tracked Java file')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .option('-x, --exclude <pattern>', 'Exclude paths containing this text (repeatable)', collect, [])
  .option('--store', 'Store the declarations in the docmodel database')
  .action(async (opts) => {
    await analyzeCommand({
      format: opts.format,
      exclude: opts.exclude,
      store: opts.store,
    });
  });

program
  .command('log')
  .description('Show commit history with per-file change kinds and line counts')
  .option('-n, --count <n>', 'Number of commits to show (0 = all)', parseCount)
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .option('--no-renames', 'Report renames as a delete plus an add')
  .option('--store', 'Store the commits in the docmodel database')
  .action(async (opts) => {
    await logCommand({
      format: opts.format,
      count: opts.count,
      renames: opts.renames === false ? false : undefined,
      store: opts.store,
    });
  });

program
  .command('history <file>')
  .description('Show the commits that touched a file')
  .option('-n, --count <n>', 'Number of commits to show (0 = all)', parseCount)
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .action(async (file: string, opts) => {
    await historyCommand(file, {
      format: opts.format,
      count: opts.count,
    });
  });

program
  .command('author <query>')
  .description('Show commits whose author name or email contains the query')
  .option('-n, --count <n>', 'Number of commits to show (0 = all)', parseCount)
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .action(async (query: string, opts) => {
    await authorCommand(query, {
      format: opts.format,
      count: opts.count,
    });
  });

program
  .command('summary')
  .description('Summarize project structure and history')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .action(async (opts) => {
    await summaryCommand({ format: opts.format });
  });

program
  .command('query <sql>')
  .description('Run a SQL query against the docmodel database')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .action(async (sql: string, opts) => {
    await queryCommand(sql, { format: opts.format });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exit(1);
});
