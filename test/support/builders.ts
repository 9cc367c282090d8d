import { createCommit, type Commit, type FileChange } from '../../src/model/commit.js';
import type { TypeDeclaration, MethodMember } from '../../src/model/type-declaration.js';

export function change(path: string, overrides: Partial<FileChange> = {}): FileChange {
  return { path, kind: 'modify', linesAdded: 0, linesDeleted: 0, ...overrides };
}

export function commit(
  hash: string,
  fileChanges: FileChange[],
  author: { name?: string; email?: string; date?: string } = {},
): Commit {
  const person = {
    name: author.name ?? 'Test Author',
    email: author.email ?? 'author@example.com',
    timestamp: new Date(author.date ?? '2024-01-01T00:00:00Z'),
  };
  return createCommit({
    hash,
    author: person,
    committer: person,
    message: `Change ${hash}\n`,
    parentHashes: [],
    fileChanges,
  });
}

export function method(overrides: Partial<MethodMember> = {}): MethodMember {
  return {
    name: 'run',
    returnType: 'void',
    parameters: [],
    modifiers: ['public'],
    annotations: [],
    thrownTypes: [],
    isConstructor: false,
    startLine: 1,
    endLine: 1,
    ...overrides,
  };
}

export function type(overrides: Partial<TypeDeclaration> = {}): TypeDeclaration {
  return {
    name: 'Widget',
    qualifiedName: 'Widget',
    kind: 'class',
    modifiers: ['public'],
    interfaces: [],
    typeParameters: [],
    annotations: [],
    startLine: 1,
    endLine: 10,
    fields: [],
    methods: [],
    nestedTypes: [],
    ...overrides,
  };
}
