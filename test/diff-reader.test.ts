import { describe, it, expect } from 'vitest';
import {
  parseLogOutput,
  parseNameStatus,
  parseUnifiedDiff,
  unquotePath,
  RECORD_SEPARATOR,
  FIELD_SEPARATOR,
} from '../src/git/diff-reader.js';

function logRecord(fields: string[]): string {
  // tformat terminates every record with a newline
  return RECORD_SEPARATOR + fields.join(FIELD_SEPARATOR) + '\n';
}

describe('parseLogOutput', () => {
  const merge = logRecord([
    'a'.repeat(40), 'b'.repeat(40), `${'c'.repeat(40)} ${'d'.repeat(40)}`,
    'Alice', 'alice@example.com', '2024-03-01T10:00:00+01:00',
    'Bob', 'bob@example.com', '2024-03-02T11:00:00+00:00',
    'Merge branch topic\n\nDetails here\n',
  ]);
  const root = logRecord([
    'e'.repeat(40), 'f'.repeat(40), '',
    'Alice', 'alice@example.com', '2024-02-01T08:30:00Z',
    'Alice', 'alice@example.com', '2024-02-01T08:30:00Z',
    'Initial commit\n',
  ]);

  it('parses every record', () => {
    const commits = parseLogOutput(merge + root);

    expect(commits).toHaveLength(2);
    expect(commits[0]).toEqual({
      hash: 'a'.repeat(40),
      tree: 'b'.repeat(40),
      parents: ['c'.repeat(40), 'd'.repeat(40)],
      author: { name: 'Alice', email: 'alice@example.com', timestamp: new Date('2024-03-01T09:00:00Z') },
      committer: { name: 'Bob', email: 'bob@example.com', timestamp: new Date('2024-03-02T11:00:00Z') },
      message: 'Merge branch topic\n\nDetails here',
    });
  });

  it('gives root commits no parents', () => {
    const [commit] = parseLogOutput(root);
    expect(commit.parents).toEqual([]);
    expect(commit.message).toBe('Initial commit');
  });

  it('skips malformed records', () => {
    const commits = parseLogOutput(`${RECORD_SEPARATOR}garbage\n${root}`);
    expect(commits.map(c => c.hash)).toEqual(['e'.repeat(40)]);
  });

  it('returns nothing for empty output', () => {
    expect(parseLogOutput('')).toEqual([]);
  });
});

describe('parseNameStatus', () => {
  it('classifies every status code', () => {
    const output = [
      'A\tsrc/New.java',
      'M\tsrc/Old.java',
      'D\tgone.txt',
      'R087\tsrc/A.java\tsrc/B.java',
      'C100\tsrc/B.java\tsrc/C.java',
      'T\tlink',
      'U\tconflict.txt',
      '',
    ].join('\n');

    expect(parseNameStatus(output)).toEqual([
      { kind: 'add', newPath: 'src/New.java' },
      { kind: 'modify', oldPath: 'src/Old.java', newPath: 'src/Old.java' },
      { kind: 'delete', oldPath: 'gone.txt' },
      { kind: 'rename', oldPath: 'src/A.java', newPath: 'src/B.java' },
      { kind: 'copy', oldPath: 'src/B.java', newPath: 'src/C.java' },
      { kind: 'modify', oldPath: 'link', newPath: 'link' },
    ]);
  });

  it('unquotes C-style quoted paths', () => {
    expect(parseNameStatus('A\t"with\\ttab.txt"\n')).toEqual([
      { kind: 'add', newPath: 'with\ttab.txt' },
    ]);
  });
});

describe('unquotePath', () => {
  it('leaves plain paths alone', () => {
    expect(unquotePath('src/Main.java')).toBe('src/Main.java');
  });

  it('resolves escaped quotes and backslashes', () => {
    expect(unquotePath('"a\\"b\\\\c"')).toBe('a"b\\c');
  });
});

describe('parseUnifiedDiff', () => {
  const patch = [
    'diff --git a/src/A.java b/src/A.java',
    'index 1111111..2222222 100644',
    '--- a/src/A.java',
    '+++ b/src/A.java',
    '@@ -3 +3 @@ class A {',
    '-    int x;',
    '+    long x;',
    '@@ -10,0 +11,2 @@ class A {',
    '+    void a() {}',
    '+    void b() {}',
    'diff --git a/old.txt b/old.txt',
    'deleted file mode 100644',
    'index 3333333..0000000',
    '--- a/old.txt',
    '+++ /dev/null',
    '@@ -1,2 +0,0 @@',
    '-one',
    '-two',
    'diff --git a/src/B.java b/src/C.java',
    'similarity index 100%',
    'rename from src/B.java',
    'rename to src/C.java',
    'diff --git a/logo.png b/logo.png',
    'new file mode 100644',
    'index 0000000..4444444',
    'Binary files /dev/null and b/logo.png differ',
    'diff --git a/notes.md b/notes.md',
    '--- a/notes.md',
    '+++ b/notes.md',
    '@@ -1 +1 @@',
    '---- a/trick',
    '+--- b/trick',
    '',
  ].join('\n');

  const files = parseUnifiedDiff(patch);

  it('keys files by new path', () => {
    expect([...files.keys()]).toEqual(['src/A.java', 'old.txt', 'src/C.java', 'logo.png', 'notes.md']);
  });

  it('turns hunk headers into half-open spans', () => {
    expect(files.get('src/A.java')).toEqual({
      binary: false,
      spans: [
        { oldStart: 2, oldEnd: 3, newStart: 2, newEnd: 3 },
        { oldStart: 10, oldEnd: 10, newStart: 10, newEnd: 12 },
      ],
    });
  });

  it('keys deletions by old path', () => {
    expect(files.get('old.txt')).toEqual({
      binary: false,
      spans: [{ oldStart: 0, oldEnd: 2, newStart: 0, newEnd: 0 }],
    });
  });

  it('records exact renames without spans', () => {
    expect(files.get('src/C.java')).toEqual({ binary: false, spans: [] });
  });

  it('marks binary files', () => {
    expect(files.get('logo.png')).toEqual({ binary: true, spans: [] });
  });

  it('ignores hunk lines that look like file headers', () => {
    expect(files.get('notes.md')).toEqual({
      binary: false,
      spans: [{ oldStart: 0, oldEnd: 1, newStart: 0, newEnd: 1 }],
    });
  });
});
