import chalk, { type ChalkInstance } from 'chalk';
import type { SourceFile } from '../../model/source-file.js';
import type { TypeDeclaration } from '../../model/type-declaration.js';
import { typeSignature, methodSignature, fieldSignature } from '../../model/type-declaration.js';
import type { Commit, FileChange, FileChangeKind } from '../../model/commit.js';
import { authorLabel } from '../../model/commit.js';
import type { AnalysisSummary } from '../../parser/analyzer.js';
import type { HistorySummary, RankedEntry } from '../../analysis/stats.js';

const RULE_WIDTH = 55;

const CHANGE_STYLES: Record<FileChangeKind, { symbol: string; color: () => ChalkInstance }> = {
  add: { symbol: '⊕', color: () => chalk.green },
  modify: { symbol: '∆', color: () => chalk.yellow },
  delete: { symbol: '⊖', color: () => chalk.red },
  rename: { symbol: '↻', color: () => chalk.cyan },
  copy: { symbol: '⧉', color: () => chalk.blue },
};

function boxHeader(title: string): string {
  const header = `─ ${title} `;
  const padLen = Math.max(0, RULE_WIDTH - header.length);
  return chalk.dim(`┌${header}${'─'.repeat(padLen)}`);
}

function boxFooter(): string {
  return chalk.dim('└' + '─'.repeat(RULE_WIDTH));
}

function plural(count: number, word: string, many = `${word}s`): string {
  return `${count} ${count === 1 ? word : many}`;
}

function formatType(type: TypeDeclaration, depth: number, lines: string[]): void {
  const indent = chalk.dim('│  ') + '  '.repeat(depth);
  lines.push(indent + `${chalk.bold(typeSignature(type))} ${chalk.dim(`(${type.qualifiedName}, L${type.startLine}-${type.endLine})`)}`);
  if (type.documentation) {
    lines.push(indent + '  ' + chalk.dim(type.documentation.split('\n')[0]));
  }
  for (const field of type.fields) {
    lines.push(indent + `  ${chalk.cyan('•')} ${fieldSignature(field)}`);
  }
  for (const method of type.methods) {
    const symbol = method.isConstructor ? chalk.magenta('⊙') : chalk.yellow('ƒ');
    lines.push(indent + `  ${symbol} ${methodSignature(method)}`);
  }
  for (const nested of type.nestedTypes) {
    formatType(nested, depth + 1, lines);
  }
}

export function formatSourceFiles(files: SourceFile[]): string {
  if (files.length === 0) {
    return chalk.dim('No source files found.');
  }

  const lines: string[] = [];
  for (const file of files) {
    lines.push(boxHeader(file.path));
    lines.push(chalk.dim('│'));
    if (!file.parsed) {
      lines.push(chalk.dim('│  ') + chalk.red(`✗ ${file.parseError ?? 'not parsed'}`));
    } else if (file.types.length === 0) {
      lines.push(chalk.dim('│  ') + chalk.dim('no type declarations'));
    }
    for (const type of file.types) {
      formatType(type, 0, lines);
    }
    lines.push(chalk.dim('│'));
    lines.push(boxFooter());
    lines.push('');
  }

  return lines.join('\n');
}

export function formatAnalysisSummary(summary: AnalysisSummary): string {
  const parts = [
    plural(summary.classes, 'class', 'classes'),
    plural(summary.interfaces, 'interface'),
    plural(summary.enums, 'enum'),
    plural(summary.records, 'record'),
    plural(summary.annotations, 'annotation'),
  ].filter(part => !part.startsWith('0 '));

  let line = `Summary: ${plural(summary.parsed, 'file')} parsed`;
  if (summary.failed > 0) line += chalk.red(`, ${summary.failed} failed`);
  if (parts.length > 0) line += ` · ${parts.join(', ')}`;
  line += ` · ${plural(summary.methods, 'method')}, ${plural(summary.fields, 'field')}`;
  return line;
}

function formatChange(change: FileChange): string {
  const style = CHANGE_STYLES[change.kind];
  const color = style.color();
  let line = `${color(style.symbol)} ${change.path.padEnd(40)} ${color(`[${change.kind}]`)}`;
  line += ` ${chalk.green(`+${change.linesAdded}`)} ${chalk.red(`-${change.linesDeleted}`)}`;
  if (change.oldPath) {
    line += chalk.dim(` from ${change.oldPath}`);
  }
  return line;
}

export function formatCommits(commits: Commit[]): string {
  if (commits.length === 0) {
    return chalk.dim('No commits found.');
  }

  const lines: string[] = [];
  for (const commit of commits) {
    lines.push(chalk.yellow(`commit ${commit.hash}`) + (commit.isMerge ? chalk.dim(' (merge)') : ''));
    lines.push(chalk.dim(`Author: ${authorLabel(commit.author)}`));
    lines.push(chalk.dim(`Date:   ${commit.author.timestamp.toISOString()}`));
    lines.push('');
    lines.push(`    ${commit.subject}`);
    lines.push('');
    for (const change of commit.fileChanges) {
      lines.push('  ' + formatChange(change));
    }
    lines.push('');
  }

  return lines.join('\n');
}

function formatRanking(title: string, entries: RankedEntry[]): string[] {
  if (entries.length === 0) return [];
  return [
    chalk.dim('│  ') + chalk.bold(title),
    ...entries.map(e => chalk.dim('│    ') + `${String(e.count).padStart(5)}  ${e.key}`),
  ];
}

export function formatHistorySummary(summary: HistorySummary, projectName?: string): string {
  const lines: string[] = [boxHeader(projectName ? `${projectName} history` : 'history'), chalk.dim('│')];

  lines.push(chalk.dim('│  ') + `Commits:  ${summary.totalCommits}`);
  lines.push(chalk.dim('│  ') + `Authors:  ${summary.authorCount}`);
  if (summary.firstCommit && summary.lastCommit) {
    lines.push(chalk.dim('│  ') + `Range:    ${summary.firstCommit.toISOString()} → ${summary.lastCommit.toISOString()}`);
  }
  lines.push(chalk.dim('│  ') + `Lines:    ${chalk.green(`+${summary.lines.added}`)} ${chalk.red(`-${summary.lines.deleted}`)}`);
  lines.push(chalk.dim('│'));
  lines.push(...formatRanking('Top contributors', summary.topContributors));
  lines.push(...formatRanking('Most changed files', summary.mostChangedFiles));
  lines.push(chalk.dim('│'));
  lines.push(boxFooter());

  return lines.join('\n');
}
