import { describe, it, expect } from 'vitest';
import { MemoryRepository, type CommitSpec } from './support/memory-repository.js';
import { extractHistory, computeFileChanges, commitsForPath, commitsByAuthor } from '../src/git/history.js';
import { RepositoryClosedError } from '../src/utils/errors.js';

const hash = (n: number): string => String(n).repeat(40);

// Newest first, as a walk yields them
const LINEAR: CommitSpec[] = [
  { hash: hash(5), parents: [hash(4)], files: { 'src/B.java': 'a\nc\n', 'src/C.java': 'a\nc\n' } },
  { hash: hash(4), parents: [hash(3)], files: { 'src/B.java': 'a\nc\n' } },
  { hash: hash(3), parents: [hash(2)], files: { 'src/A.java': 'a\nc\n' } },
  { hash: hash(2), parents: [hash(1)], files: { 'src/A.java': 'a\nc\n', 'README.md': 'x\n' } },
  {
    hash: hash(1),
    message: 'Initial import\n\nAdds the sources.\n',
    files: { 'src/A.java': 'a\nb\n', 'README.md': 'x\n' },
  },
];

function byHash<T extends { hash: string }>(commits: T[], n: number): T {
  const found = commits.find(c => c.hash === hash(n));
  if (!found) throw new Error(`missing commit ${n}`);
  return found;
}

describe('extractHistory', () => {
  it('diffs a root commit against the empty tree', async () => {
    const commits = await extractHistory(new MemoryRepository(LINEAR));
    const root = commits[4];

    expect(root.hash).toBe(hash(1));
    expect(root.parentHashes).toEqual([]);
    expect(root.isMerge).toBe(false);
    expect(root.fileChanges).toEqual([
      { path: 'README.md', kind: 'add', linesAdded: 1, linesDeleted: 0 },
      { path: 'src/A.java', kind: 'add', linesAdded: 2, linesDeleted: 0 },
    ]);
  });

  it('derives short hash and subject', async () => {
    const commits = await extractHistory(new MemoryRepository(LINEAR));
    const root = commits[4];

    expect(root.shortHash).toBe('1111111');
    expect(root.subject).toBe('Initial import');
    expect(root.message).toBe('Initial import\n\nAdds the sources.\n');
  });

  it('keeps walk order', async () => {
    const commits = await extractHistory(new MemoryRepository(LINEAR));
    expect(commits.map(c => c.hash)).toEqual([hash(5), hash(4), hash(3), hash(2), hash(1)]);
  });

  it('counts modified lines from edit spans', async () => {
    const commits = await extractHistory(new MemoryRepository(LINEAR));
    expect(byHash(commits, 2)).toMatchObject({
      fileChanges: [{ path: 'src/A.java', kind: 'modify', linesAdded: 1, linesDeleted: 1 }],
    });
  });

  it('reports deletions under the old path', async () => {
    const commits = await extractHistory(new MemoryRepository(LINEAR));
    const change = byHash(commits, 3);
    expect(change).toMatchObject({
      fileChanges: [{ path: 'README.md', kind: 'delete', linesAdded: 0, linesDeleted: 1 }],
    });
  });

  it('detects renames and copies', async () => {
    const commits = await extractHistory(new MemoryRepository(LINEAR));

    expect(byHash(commits, 4)).toMatchObject({
      fileChanges: [{ path: 'src/B.java', oldPath: 'src/A.java', kind: 'rename', linesAdded: 0, linesDeleted: 0 }],
    });
    expect(byHash(commits, 5)).toMatchObject({
      fileChanges: [{ path: 'src/C.java', oldPath: 'src/B.java', kind: 'copy', linesAdded: 0, linesDeleted: 0 }],
    });
  });

  it('reports a delete plus an add when rename detection is off', async () => {
    const commits = await extractHistory(new MemoryRepository(LINEAR), { detectRenames: false });
    expect(byHash(commits, 4).fileChanges).toEqual([
      { path: 'src/A.java', kind: 'delete', linesAdded: 0, linesDeleted: 2 },
      { path: 'src/B.java', kind: 'add', linesAdded: 2, linesDeleted: 0 },
    ]);
  });

  it('honours the limit and walks all refs by default', async () => {
    const repo = new MemoryRepository(LINEAR);
    const commits = await extractHistory(repo, { limit: 2 });

    expect(commits.map(c => c.hash)).toEqual([hash(5), hash(4)]);
    expect(repo.walks).toEqual([{ maxCount: 2, allRefs: true }]);
  });

  it('diffs merge commits against the first parent only', async () => {
    const repo = new MemoryRepository([
      { hash: 'm4', parents: ['m2', 'm3'], files: { 'a.txt': '1\n', 'b.txt': '2\n', 'c.txt': '3\n' } },
      { hash: 'm3', parents: ['m1'], files: { 'a.txt': '1\n', 'c.txt': '3\n' } },
      { hash: 'm2', parents: ['m1'], files: { 'a.txt': '1\n', 'b.txt': '2\n' } },
      { hash: 'm1', files: { 'a.txt': '1\n' } },
    ]);

    const [merge] = await extractHistory(repo);

    expect(merge.isMerge).toBe(true);
    expect(merge.shortHash).toBeUndefined();
    expect(merge.fileChanges).toEqual([
      { path: 'c.txt', kind: 'add', linesAdded: 1, linesDeleted: 0 },
    ]);
  });

  it('zeroes line counts for binary content but keeps the change', async () => {
    const repo = new MemoryRepository([
      { hash: 'r1', files: { 'Main.java': 'class Main {}\n', 'logo.png': 'PNG\0data' } },
    ]);

    const [commit] = await extractHistory(repo);

    expect(commit.fileChanges).toEqual([
      { path: 'Main.java', kind: 'add', linesAdded: 1, linesDeleted: 0 },
      { path: 'logo.png', kind: 'add', linesAdded: 0, linesDeleted: 0 },
    ]);
  });

  it('zeroes line counts when the edit list fails', async () => {
    const repo = new MemoryRepository([{ hash: 'r1', files: { 'Main.java': 'one\ntwo\n' } }]);
    repo.failingPaths.add('Main.java');

    const [commit] = await extractHistory(repo);

    expect(commit.fileChanges).toEqual([
      { path: 'Main.java', kind: 'add', linesAdded: 0, linesDeleted: 0 },
    ]);
  });

  it('closes one formatter per commit', async () => {
    const repo = new MemoryRepository(LINEAR);
    await extractHistory(repo);

    expect(repo.formattersOpened).toBe(5);
    expect(repo.formattersClosed).toBe(5);
  });

  it('closes the formatter when a scan fails', async () => {
    const repo = new MemoryRepository(LINEAR.slice(3));
    repo.failingScans.add(hash(2));

    await expect(extractHistory(repo)).rejects.toThrow(`scan failed for ${hash(2)}`);
    expect(repo.formattersOpened).toBe(1);
    expect(repo.formattersClosed).toBe(1);
  });

  it('rejects once the repository is closed', async () => {
    const repo = new MemoryRepository(LINEAR);
    repo.close();

    await expect(extractHistory(repo)).rejects.toBeInstanceOf(RepositoryClosedError);
    await expect(commitsForPath(repo, 'README.md')).rejects.toBeInstanceOf(RepositoryClosedError);
    await expect(commitsByAuthor(repo, 'Test')).rejects.toBeInstanceOf(RepositoryClosedError);
  });
});

describe('computeFileChanges', () => {
  it('diffs a single raw commit', async () => {
    const repo = new MemoryRepository(LINEAR);
    const [raw] = await repo.walkCommits({ maxCount: 1 });

    const changes = await computeFileChanges(repo, raw);

    expect(changes).toEqual([
      { path: 'src/C.java', oldPath: 'src/B.java', kind: 'copy', linesAdded: 0, linesDeleted: 0 },
    ]);
    expect(repo.formattersClosed).toBe(1);
  });
});

describe('commitsForPath', () => {
  it('returns only commits touching the path', async () => {
    const repo = new MemoryRepository(LINEAR);
    const commits = await commitsForPath(repo, 'README.md');

    expect(commits.map(c => c.hash)).toEqual([hash(3), hash(1)]);
    expect(repo.walks).toEqual([{ maxCount: 0, path: 'README.md' }]);
  });

  it('matches the old side of a rename', async () => {
    const commits = await commitsForPath(new MemoryRepository(LINEAR), 'src/A.java');
    expect(commits.map(c => c.hash)).toEqual([hash(4), hash(2), hash(1)]);
  });

  it('applies the limit to the walk', async () => {
    const commits = await commitsForPath(new MemoryRepository(LINEAR), 'src/A.java', { limit: 1 });
    expect(commits.map(c => c.hash)).toEqual([hash(4)]);
  });
});

describe('commitsByAuthor', () => {
  const AUTHORED: CommitSpec[] = [
    { hash: 'c3', parents: ['c2'], author: { name: 'Bob', email: 'bob@corp.test' }, files: { 'x': '3\n' } },
    { hash: 'c2', parents: ['c1'], author: { name: 'Alice', email: 'alice@example.com' }, files: { 'x': '2\n' } },
    { hash: 'c1', author: { name: 'Alice', email: 'alice@example.com' }, files: { 'x': '1\n' } },
  ];

  it('matches a substring of the email', async () => {
    const commits = await commitsByAuthor(new MemoryRepository(AUTHORED), 'alice');
    expect(commits.map(c => c.hash)).toEqual(['c2', 'c1']);
  });

  it('matches a substring of the name', async () => {
    const commits = await commitsByAuthor(new MemoryRepository(AUTHORED), 'Bo');
    expect(commits.map(c => c.hash)).toEqual(['c3']);
  });

  it('is case-sensitive', async () => {
    const commits = await commitsByAuthor(new MemoryRepository(AUTHORED), 'BOB');
    expect(commits).toEqual([]);
  });

  it('filters the whole history before applying the limit', async () => {
    const repo = new MemoryRepository(AUTHORED);
    const commits = await commitsByAuthor(repo, 'alice', { limit: 1 });

    expect(commits.map(c => c.hash)).toEqual(['c2']);
    expect(repo.walks).toEqual([{ maxCount: 0, allRefs: true }]);
  });
});
