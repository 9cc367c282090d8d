import { resolve } from 'node:path';
import chalk from 'chalk';
import { loadConfig } from '../../config/config.js';
import { analyzeStructure, analyzeDirectory } from '../../analysis/project.js';
import { openRepository } from '../../git/history.js';
import { summarizeAnalysis } from '../../parser/analyzer.js';
import { createDefaultRegistry } from '../../parser/plugins/index.js';
import { formatSourceFiles, formatAnalysisSummary } from '../formatters/terminal.js';
import { formatAnalysisJson } from '../formatters/json.js';
import { openDatabase, type OutputFormat } from './shared.js';

export interface AnalyzeCommandOptions {
  cwd?: string;
  format?: OutputFormat;
  store?: boolean;
  exclude?: string[];
}

export async function analyzeCommand(opts: AnalyzeCommandOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const connection = await openRepository(cwd);
  const root = connection.connected ? connection.repository.root : resolve(cwd);

  try {
    const config = await loadConfig(root, {
      excludePatterns: opts.exclude && opts.exclude.length > 0 ? opts.exclude : undefined,
    });
    const format = opts.format ?? 'terminal';

    const registry = createDefaultRegistry();
    const progress = {
      onProgress: (done: number, total: number, path: string) => {
        if (format === 'terminal' && process.stderr.isTTY) {
          process.stderr.write(chalk.dim(`\r  Parsing ${done}/${total} ${path}`.padEnd(80)));
        }
      },
    };

    if (!connection.connected) {
      console.error(chalk.yellow(`${connection.error}; scanning ${root} instead`));
    }
    const files = connection.connected
      ? await analyzeStructure(connection.repository, config, registry, progress)
      : await analyzeDirectory(root, config, registry, progress);
    if (format === 'terminal' && process.stderr.isTTY) {
      process.stderr.write('\r' + ' '.repeat(80) + '\r');
    }

    const summary = summarizeAnalysis(files);

    if (opts.store) {
      const db = openDatabase(root, config);
      for (const file of files) {
        db.insertSourceFile(file);
      }
      db.setMetadata('analyzed_at', new Date().toISOString());
      db.close();
    }

    if (format === 'json') {
      console.log(formatAnalysisJson(files, summary));
    } else {
      console.log(formatSourceFiles(files));
      console.log(formatAnalysisSummary(summary));
      if (opts.store) {
        console.log(chalk.dim(`Stored ${files.length} files in ${config.database}`));
      }
    }
  } finally {
    if (connection.connected) connection.repository.close();
  }
}
