import { simpleGit, type SimpleGit } from 'simple-git';
import type {
  RawCommit,
  TreeRef,
  TreeDiffEntry,
  EditSpan,
  WalkOptions,
  DiffFormatter,
  DiffFormatterOptions,
  RepositoryHandle,
} from './types.js';
import type { PatchFile } from './diff-reader.js';
import { LOG_FORMAT, parseLogOutput, parseNameStatus, parseUnifiedDiff } from './diff-reader.js';
import { BinaryContentError, DocModelError, RepositoryClosedError } from '../utils/errors.js';

/** Git's well-known hash of the tree with no entries. */
export const EMPTY_TREE_HASH = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';

function treeArg(ref: TreeRef): string {
  return ref.type === 'empty' ? EMPTY_TREE_HASH : ref.hash;
}

export class GitBridge implements RepositoryHandle {
  readonly root: string;
  private git: SimpleGit;
  private isClosed = false;
  private formatters = new Set<GitDiffFormatter>();

  constructor(repoPath: string) {
    this.root = repoPath;
    // Keep non-ASCII path names unescaped in diff and ls-files output
    this.git = simpleGit({ baseDir: repoPath, config: ['core.quotePath=false'] });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async isRepo(): Promise<boolean> {
    try {
      await this.git.revparse(['--is-inside-work-tree']);
      return true;
    } catch {
      return false;
    }
  }

  async getRepoRoot(): Promise<string> {
    const root = await this.git.revparse(['--show-toplevel']);
    return root.trim();
  }

  async getCurrentBranch(): Promise<string> {
    const branch = await this.git.revparse(['--abbrev-ref', 'HEAD']);
    return branch.trim();
  }

  async getHeadSha(): Promise<string> {
    const sha = await this.git.revparse(['HEAD']);
    return sha.trim();
  }

  async hasCommits(): Promise<boolean> {
    const output = await this.git.raw(['rev-list', '-n', '1', '--all']);
    return output.trim().length > 0;
  }

  /** Tracked files relative to the repository root. */
  async listFiles(): Promise<string[]> {
    this.ensureOpen();
    const output = await this.git.raw(['ls-files']);
    return output.split('\n').map(line => line.trim()).filter(Boolean);
  }

  async walkCommits(options: WalkOptions = {}): Promise<RawCommit[]> {
    this.ensureOpen();
    if (!(await this.hasCommits())) {
      return [];
    }

    const args = ['log', `--format=${LOG_FORMAT}`];
    if (options.maxCount && options.maxCount > 0) {
      args.push(`--max-count=${options.maxCount}`);
    }
    if (options.allRefs) {
      args.push('--all');
    }
    if (options.path) {
      args.push('--', options.path);
    }

    return parseLogOutput(await this.git.raw(args));
  }

  newDiffFormatter(options: DiffFormatterOptions = {}): DiffFormatter {
    this.ensureOpen();
    const formatter = new GitDiffFormatter(this.git, options.detectRenames ?? true, () => {
      this.formatters.delete(formatter);
    });
    this.formatters.add(formatter);
    return formatter;
  }

  close(): void {
    for (const formatter of [...this.formatters]) {
      formatter.close();
    }
    this.isClosed = true;
  }

  private ensureOpen(): void {
    if (this.isClosed) {
      throw new RepositoryClosedError(this.root);
    }
  }
}

/**
 * Diffs one pair of trees. Line-level edits come from a single zero-context
 * patch, fetched on first use and shared by every entry of the scan.
 */
class GitDiffFormatter implements DiffFormatter {
  private pair: [string, string] | undefined;
  private patch: Promise<Map<string, PatchFile>> | undefined;
  private isClosed = false;

  constructor(
    private git: SimpleGit,
    private detectRenames: boolean,
    private onClose: () => void,
  ) {}

  async scan(oldTree: TreeRef, newTree: TreeRef): Promise<TreeDiffEntry[]> {
    this.ensureOpen();
    this.pair = [treeArg(oldTree), treeArg(newTree)];
    this.patch = undefined;

    const output = await this.git.raw(['diff', '--name-status', ...this.renameFlags(), ...this.pair]);
    return parseNameStatus(output);
  }

  async editList(entry: TreeDiffEntry): Promise<EditSpan[]> {
    this.ensureOpen();
    const pair = this.pair;
    if (!pair) {
      throw new DocModelError('editList called before scan');
    }

    this.patch ??= this.git
      .raw(['diff', '-U0', '--no-color', '--no-ext-diff', ...this.renameFlags(), ...pair])
      .then(parseUnifiedDiff);

    const path = entry.kind === 'delete' ? entry.oldPath : entry.newPath;
    const file = path ? (await this.patch).get(path) : undefined;
    if (file?.binary) {
      throw new BinaryContentError(path ?? '');
    }
    // Mode-only changes and exact renames carry no hunks
    return file?.spans ?? [];
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.pair = undefined;
    this.patch = undefined;
    this.onClose();
  }

  private renameFlags(): string[] {
    return this.detectRenames ? ['-M', '-C'] : ['--no-renames'];
  }

  private ensureOpen(): void {
    if (this.isClosed) {
      throw new DocModelError('Diff formatter has been closed');
    }
  }
}
