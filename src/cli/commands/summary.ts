import chalk from 'chalk';
import { loadConfig } from '../../config/config.js';
import { analyzeProject } from '../../analysis/project.js';
import { summarizeAnalysis } from '../../parser/analyzer.js';
import { summarizeHistory } from '../../analysis/stats.js';
import { formatAnalysisSummary, formatHistorySummary } from '../formatters/terminal.js';
import { formatSummaryJson } from '../formatters/json.js';
import { openRepository } from '../../git/history.js';
import type { OutputFormat } from './shared.js';

export interface SummaryOptions {
  cwd?: string;
  format?: OutputFormat;
}

export async function summaryCommand(opts: SummaryOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const connection = await openRepository(cwd);
  let root = cwd;
  if (connection.connected) {
    root = connection.repository.root;
    connection.repository.close();
  }

  const config = await loadConfig(root);
  const result = await analyzeProject({ cwd: root, config });
  if (!result.connected) {
    console.error(chalk.yellow(`History unavailable: ${result.connectionError ?? 'repository unavailable'}`));
  }

  const analysis = summarizeAnalysis(result.files);
  const history = summarizeHistory(result.commits);

  if (opts.format === 'json') {
    console.log(formatSummaryJson(config.projectName, analysis, history));
    return;
  }

  console.log(formatHistorySummary(history, config.projectName));
  console.log(formatAnalysisSummary(analysis));
  if (result.historyError) {
    console.log(chalk.yellow(`History incomplete: ${result.historyError}`));
  }
}
