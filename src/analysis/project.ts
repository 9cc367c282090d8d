import type { Dirent } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Commit } from '../model/commit.js';
import type { SourceFile } from '../model/source-file.js';
import type { DocModelConfig } from '../config/config.js';
import { shouldExclude } from '../config/config.js';
import type { ParserRegistry } from '../parser/registry.js';
import type { AnalyzeOptions, SourceInput } from '../parser/analyzer.js';
import { analyzeSources } from '../parser/analyzer.js';
import { createDefaultRegistry } from '../parser/plugins/index.js';
import { openRepository, extractHistory } from '../git/history.js';
import type { GitBridge } from '../git/bridge.js';
import type { FileHistory } from './aggregator.js';
import { joinHistory } from './aggregator.js';
import { fileNameOf, getExtension } from '../utils/path.js';
import { errorMessage } from '../utils/errors.js';
import { createContextLogger } from '../utils/logger.js';

const log = createContextLogger('project');

export interface ProjectOptions extends AnalyzeOptions {
  cwd: string;
  config: DocModelConfig;
  registry?: ParserRegistry;
}

export interface ProjectAnalysis {
  /** Repository root, or the walked directory when no repository opened */
  root: string;
  files: SourceFile[];
  commits: Commit[];
  histories: FileHistory[];
  connected: boolean;
  connectionError?: string;
  /** Set when the repository opened but its history could not be read */
  historyError?: string;
}

/**
 * Structure of every source file plus the repository history, joined per
 * file. Without a repository the files come from a directory walk and the
 * history is empty. Failures are reported on the result rather than thrown.
 */
export async function analyzeProject(options: ProjectOptions): Promise<ProjectAnalysis> {
  const { cwd, config } = options;
  const registry = options.registry ?? createDefaultRegistry();

  const connection = await openRepository(cwd);
  if (!connection.connected) {
    log.warn(connection.error);
    const root = resolve(cwd);
    const files = await analyzeDirectory(root, config, registry, options);
    return {
      root,
      files,
      commits: [],
      histories: joinHistory(files, []),
      connected: false,
      connectionError: connection.error,
    };
  }

  const repo = connection.repository;
  try {
    const files = await analyzeStructure(repo, config, registry, options);

    let commits: Commit[] = [];
    let historyError: string | undefined;
    try {
      commits = await extractHistory(repo, {
        limit: config.maxCommits,
        detectRenames: config.detectRenames,
        allRefs: config.allBranches,
      });
    } catch (err) {
      historyError = errorMessage(err);
      log.warn(`Could not read history: ${historyError}`);
    }

    return {
      root: repo.root,
      files,
      commits,
      histories: joinHistory(files, commits),
      connected: true,
      historyError,
    };
  } finally {
    repo.close();
  }
}

/** Tracked files with a registered extension that no exclude pattern matches. */
export async function discoverSources(repo: GitBridge, config: DocModelConfig, registry: ParserRegistry): Promise<string[]> {
  const extensions = new Set(registry.supportedExtensions());
  const paths = (await repo.listFiles()).filter(
    path => extensions.has(getExtension(path)) && !shouldExclude(path, config.excludePatterns),
  );
  log.debug(`Found ${paths.length} source files in ${repo.root}`);
  return paths;
}

/** Walks `root` for files with a registered extension, honoring excludes, `recursive` and `maxDepth`. */
export async function walkSources(root: string, config: DocModelConfig, registry: ParserRegistry): Promise<string[]> {
  const extensions = new Set(registry.supportedExtensions());
  const maxDepth = config.recursive ? config.maxDepth : 1;
  const paths: string[] = [];

  async function walk(dir: string, depth: number): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(join(root, dir), { withFileTypes: true });
    } catch (err) {
      log.warn(`Could not list ${join(root, dir)}`, { error: errorMessage(err) });
      return;
    }
    for (const entry of entries) {
      const path = dir ? `${dir}/${entry.name}` : entry.name;
      if (shouldExclude(path, config.excludePatterns)) continue;
      if (entry.isDirectory()) {
        if (depth < maxDepth) await walk(path, depth + 1);
      } else if (entry.isFile() && extensions.has(getExtension(entry.name))) {
        paths.push(path);
      }
    }
  }

  await walk('', 1);
  paths.sort();
  log.debug(`Found ${paths.length} source files under ${root}`);
  return paths;
}

export async function analyzeStructure(
  repo: GitBridge,
  config: DocModelConfig,
  registry: ParserRegistry,
  options: AnalyzeOptions = {},
): Promise<SourceFile[]> {
  const paths = await discoverSources(repo, config, registry);
  return analyzePaths(repo.root, paths, registry, options);
}

/** Structure of the files under a plain directory, no repository involved. */
export async function analyzeDirectory(
  root: string,
  config: DocModelConfig,
  registry: ParserRegistry,
  options: AnalyzeOptions = {},
): Promise<SourceFile[]> {
  const paths = await walkSources(root, config, registry);
  return analyzePaths(root, paths, registry, options);
}

async function analyzePaths(
  root: string,
  paths: string[],
  registry: ParserRegistry,
  options: AnalyzeOptions,
): Promise<SourceFile[]> {
  const { inputs, unreadable } = await readSources(root, paths);
  return [...analyzeSources(inputs, registry, options), ...unreadable];
}

async function readSources(root: string, paths: string[]): Promise<{ inputs: SourceInput[]; unreadable: SourceFile[] }> {
  const inputs: SourceInput[] = [];
  const unreadable: SourceFile[] = [];

  for (const path of paths) {
    try {
      inputs.push({ path, content: await readFile(resolve(root, path), 'utf-8') });
    } catch (err) {
      log.warn(`Could not read ${path}`, { error: errorMessage(err) });
      unreadable.push({
        path,
        fileName: fileNameOf(path),
        imports: [],
        types: [],
        lineCount: 0,
        parsed: false,
        parseError: `Could not read file: ${errorMessage(err)}`,
      });
    }
  }

  return { inputs, unreadable };
}
