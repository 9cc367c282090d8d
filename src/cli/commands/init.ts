import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { CONFIG_FILE, loadConfig, serializeConfig } from '../../config/config.js';
import { requireRepository, openDatabase, databasePath } from './shared.js';

export async function initCommand(opts: { cwd?: string } = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const repo = await requireRepository(cwd);

  try {
    const config = await loadConfig(repo.root);
    const configPath = resolve(repo.root, CONFIG_FILE);

    if (existsSync(configPath)) {
      console.log(chalk.yellow(`${CONFIG_FILE} already exists. Keeping it.`));
    } else {
      await writeFile(configPath, serializeConfig(config), 'utf-8');
    }

    const dbPath = databasePath(repo.root, config);
    if (existsSync(dbPath)) {
      console.log(chalk.yellow('Database already exists. Reinitializing metadata...'));
    }

    const db = openDatabase(repo.root, config);
    const branch = await repo.getCurrentBranch();
    db.setMetadata('version', '0.1.0');
    db.setMetadata('initialized_at', new Date().toISOString());
    db.setMetadata('branch', branch);
    db.setMetadata('project', config.projectName);
    db.close();

    console.log(chalk.green(`Initialized docmodel in ${repo.root}`));
    console.log(chalk.dim(`  Config:   ${configPath}`));
    console.log(chalk.dim(`  Database: ${dbPath}`));
    console.log(chalk.dim(`  Branch:   ${branch}`));
  } finally {
    repo.close();
  }
}
