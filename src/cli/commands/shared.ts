import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import chalk from 'chalk';
import type { GitBridge } from '../../git/bridge.js';
import { openRepository } from '../../git/history.js';
import { DocDatabase } from '../../storage/database.js';
import type { DocModelConfig } from '../../config/config.js';

export type OutputFormat = 'terminal' | 'json';

/** Opens the repository around `cwd` or exits with an error message. */
export async function requireRepository(cwd: string): Promise<GitBridge> {
  const connection = await openRepository(cwd);
  if (!connection.connected) {
    console.error(chalk.red('Error: Not inside a Git repository.'));
    console.error(chalk.dim(`  ${connection.error}`));
    process.exit(1);
  }
  return connection.repository;
}

export function databasePath(root: string, config: DocModelConfig): string {
  return resolve(root, config.database);
}

export function openDatabase(root: string, config: DocModelConfig): DocDatabase {
  const dbPath = databasePath(root, config);
  mkdirSync(dirname(dbPath), { recursive: true });
  return new DocDatabase(dbPath);
}
