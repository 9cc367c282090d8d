import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../utils/errors.js';

export const CONFIG_FILE = '.docmodel.yml';

export const DEFAULT_EXCLUDE_PATTERNS = ['target', 'build', '.git', '.idea', 'node_modules'];
export const DEFAULT_DATABASE = '.docmodel/docmodel.db';
export const DEFAULT_MAX_DEPTH = 20;

const ConfigFileSchema = z.object({
  projectName: z.string().min(1).optional(),
  excludePatterns: z.array(z.string()).default(DEFAULT_EXCLUDE_PATTERNS),
  maxCommits: z.number().int().nonnegative().default(0),
  detectRenames: z.boolean().default(true),
  allBranches: z.boolean().default(true),
  recursive: z.boolean().default(true),
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  database: z.string().min(1).default(DEFAULT_DATABASE),
}).strict();

export interface DocModelConfig {
  projectName: string;
  /** Paths containing any of these (case-insensitive) are skipped */
  excludePatterns: string[];
  /** 0 = whole history */
  maxCommits: number;
  detectRenames: boolean;
  allBranches: boolean;
  /** Directory walk only: descend into subdirectories */
  recursive: boolean;
  /** Directory walk only: deepest level searched, files in the root being level 1 */
  maxDepth: number;
  /** Relative to the repository root */
  database: string;
}

export type ConfigOverrides = Partial<DocModelConfig>;

/** Validates the text of a config file; an empty file yields the defaults. */
export function parseConfig(text: string, root: string, overrides: ConfigOverrides = {}): DocModelConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${CONFIG_FILE}: ${errorMessage(err)}`);
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${issues.join('; ')}`, { issues });
  }

  const file = result.data;
  return {
    projectName: overrides.projectName ?? file.projectName ?? basename(root),
    excludePatterns: overrides.excludePatterns ?? file.excludePatterns,
    maxCommits: overrides.maxCommits ?? file.maxCommits,
    detectRenames: overrides.detectRenames ?? file.detectRenames,
    allBranches: overrides.allBranches ?? file.allBranches,
    recursive: overrides.recursive ?? file.recursive,
    maxDepth: overrides.maxDepth ?? file.maxDepth,
    database: overrides.database ?? file.database,
  };
}

export function defaultConfig(root: string, overrides: ConfigOverrides = {}): DocModelConfig {
  return parseConfig('', root, overrides);
}

/** Reads `.docmodel.yml` from `root`; a missing file means defaults. */
export async function loadConfig(root: string, overrides: ConfigOverrides = {}): Promise<DocModelConfig> {
  let text: string;
  try {
    text = await readFile(resolve(root, CONFIG_FILE), 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return defaultConfig(root, overrides);
    }
    throw new ConfigError(`Could not read ${CONFIG_FILE}: ${errorMessage(err)}`);
  }
  return parseConfig(text, root, overrides);
}

export function serializeConfig(config: DocModelConfig): string {
  return yaml.dump(config);
}

export function shouldExclude(path: string, patterns: string[]): boolean {
  const lower = path.toLowerCase();
  return patterns.some(pattern => lower.includes(pattern.toLowerCase()));
}
