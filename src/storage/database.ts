import Database from 'better-sqlite3';
import type { SourceFile } from '../model/source-file.js';
import type { TypeDeclaration, TypeKind } from '../model/type-declaration.js';
import { fieldSignature, methodSignature } from '../model/type-declaration.js';
import type { Commit, FileChange, FileChangeKind } from '../model/commit.js';
import { createCommit } from '../model/commit.js';
import { SCHEMA_DDL } from './schema.js';

export interface StoredType {
  filePath: string;
  qualifiedName: string;
  name: string;
  kind: TypeKind;
  packageName?: string;
  /** Qualified name of the enclosing type for nested declarations */
  parentName?: string;
  modifiers: string[];
  superClass?: string;
  interfaces: string[];
  typeParameters: string[];
  annotations: string[];
  documentation?: string;
  startLine: number;
  endLine: number;
}

export interface StoredMember {
  typeName: string;
  memberKind: 'field' | 'method' | 'constructor';
  name: string;
  signature: string;
  documentation?: string;
  startLine: number;
}

export interface StoredFileChange extends FileChange {
  commitHash: string;
}

interface TypeRow {
  file_path: string;
  qualified_name: string;
  name: string;
  kind: TypeKind;
  package_name: string | null;
  parent_name: string | null;
  modifiers: string;
  super_class: string | null;
  interfaces: string;
  type_parameters: string;
  annotations: string;
  documentation: string | null;
  start_line: number;
  end_line: number;
}

interface MemberRow {
  type_name: string;
  member_kind: StoredMember['memberKind'];
  name: string;
  signature: string;
  documentation: string | null;
  start_line: number;
}

interface CommitRow {
  hash: string;
  author_name: string;
  author_email: string;
  author_time: string;
  committer_name: string;
  committer_email: string;
  committer_time: string;
  message: string;
  parent_hashes: string;
}

interface FileChangeRow {
  commit_hash: string;
  path: string;
  old_path: string | null;
  kind: FileChangeKind;
  lines_added: number;
  lines_deleted: number;
}

function parseList(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function toFileChange(row: FileChangeRow): FileChange {
  return {
    path: row.path,
    oldPath: row.old_path ?? undefined,
    kind: row.kind,
    linesAdded: row.lines_added,
    linesDeleted: row.lines_deleted,
  };
}

export class DocDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.init();
  }

  private init(): void {
    this.db.exec(SCHEMA_DDL);
  }

  setMetadata(key: string, value: string): void {
    this.db.prepare(
      'INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)'
    ).run(key, value);
  }

  getMetadata(key: string): string | undefined {
    const row = this.db.prepare('SELECT value FROM metadata WHERE key = ?').get(key) as { value: string } | undefined;
    return row?.value;
  }

  /** Replaces everything stored for the file's path. */
  insertSourceFile(file: SourceFile): void {
    const insertType = this.db.prepare(`
      INSERT INTO types (file_path, qualified_name, name, kind, package_name, parent_name, modifiers, super_class, interfaces, type_parameters, annotations, documentation, start_line, end_line)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertMember = this.db.prepare(`
      INSERT INTO members (file_path, type_name, member_kind, name, signature, documentation, start_line)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const insert = (type: TypeDeclaration, parentName: string | null): void => {
      insertType.run(
        file.path, type.qualifiedName, type.name, type.kind, file.packageName ?? null, parentName,
        JSON.stringify(type.modifiers), type.superClass ?? null, JSON.stringify(type.interfaces),
        JSON.stringify(type.typeParameters), JSON.stringify(type.annotations), type.documentation ?? null,
        type.startLine, type.endLine,
      );
      for (const field of type.fields) {
        insertMember.run(file.path, type.qualifiedName, 'field', field.name, fieldSignature(field), field.documentation ?? null, field.line);
      }
      for (const method of type.methods) {
        const kind = method.isConstructor ? 'constructor' : 'method';
        insertMember.run(file.path, type.qualifiedName, kind, method.name, methodSignature(method), method.documentation ?? null, method.startLine);
      }
      for (const nested of type.nestedTypes) {
        insert(nested, type.qualifiedName);
      }
    };

    const tx = this.db.transaction((source: SourceFile) => {
      this.db.prepare('DELETE FROM types WHERE file_path = ?').run(source.path);
      this.db.prepare('DELETE FROM members WHERE file_path = ?').run(source.path);
      for (const type of source.types) {
        insert(type, null);
      }
    });

    tx(file);
  }

  getTypes(opts?: { filePath?: string; kind?: TypeKind }): StoredType[] {
    let sql = 'SELECT * FROM types WHERE 1=1';
    const params: unknown[] = [];

    if (opts?.filePath) {
      sql += ' AND file_path = ?';
      params.push(opts.filePath);
    }
    if (opts?.kind) {
      sql += ' AND kind = ?';
      params.push(opts.kind);
    }

    sql += ' ORDER BY id ASC';

    const rows = this.db.prepare(sql).all(...params) as TypeRow[];
    return rows.map(row => ({
      filePath: row.file_path,
      qualifiedName: row.qualified_name,
      name: row.name,
      kind: row.kind,
      packageName: row.package_name ?? undefined,
      parentName: row.parent_name ?? undefined,
      modifiers: parseList(row.modifiers),
      superClass: row.super_class ?? undefined,
      interfaces: parseList(row.interfaces),
      typeParameters: parseList(row.type_parameters),
      annotations: parseList(row.annotations),
      documentation: row.documentation ?? undefined,
      startLine: row.start_line,
      endLine: row.end_line,
    }));
  }

  getMembers(typeName: string): StoredMember[] {
    const rows = this.db.prepare(
      'SELECT * FROM members WHERE type_name = ? ORDER BY id ASC'
    ).all(typeName) as MemberRow[];
    return rows.map(row => ({
      typeName: row.type_name,
      memberKind: row.member_kind,
      name: row.name,
      signature: row.signature,
      documentation: row.documentation ?? undefined,
      startLine: row.start_line,
    }));
  }

  /** Upserts commits with their file changes, keeping walk order for new hashes. */
  insertCommits(commits: Commit[]): void {
    const insertCommit = this.db.prepare(`
      INSERT INTO commits (hash, author_name, author_email, author_time, committer_name, committer_email, committer_time, message, parent_hashes)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(hash) DO UPDATE SET
        author_name = excluded.author_name,
        author_email = excluded.author_email,
        author_time = excluded.author_time,
        committer_name = excluded.committer_name,
        committer_email = excluded.committer_email,
        committer_time = excluded.committer_time,
        message = excluded.message,
        parent_hashes = excluded.parent_hashes
    `);
    const clearChanges = this.db.prepare('DELETE FROM file_changes WHERE commit_hash = ?');
    const insertChange = this.db.prepare(`
      INSERT INTO file_changes (commit_hash, path, old_path, kind, lines_added, lines_deleted)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const tx = this.db.transaction((batch: Commit[]) => {
      for (const c of batch) {
        insertCommit.run(
          c.hash, c.author.name, c.author.email, c.author.timestamp.toISOString(),
          c.committer.name, c.committer.email, c.committer.timestamp.toISOString(),
          c.message, JSON.stringify(c.parentHashes),
        );
        clearChanges.run(c.hash);
        for (const f of c.fileChanges) {
          insertChange.run(c.hash, f.path, f.oldPath ?? null, f.kind, f.linesAdded, f.linesDeleted);
        }
      }
    });

    tx(commits);
  }

  getCommits(opts?: { author?: string; limit?: number }): Commit[] {
    let sql = 'SELECT * FROM commits WHERE 1=1';
    const params: unknown[] = [];

    if (opts?.author) {
      sql += ' AND (instr(author_name, ?) > 0 OR instr(author_email, ?) > 0)';
      params.push(opts.author, opts.author);
    }

    sql += ' ORDER BY seq ASC';

    if (opts?.limit) {
      sql += ' LIMIT ?';
      params.push(opts.limit);
    }

    const rows = this.db.prepare(sql).all(...params) as CommitRow[];
    return rows.map(row => createCommit({
      hash: row.hash,
      author: { name: row.author_name, email: row.author_email, timestamp: new Date(row.author_time) },
      committer: { name: row.committer_name, email: row.committer_email, timestamp: new Date(row.committer_time) },
      message: row.message,
      parentHashes: parseList(row.parent_hashes),
      fileChanges: this.changeRows({ commitHash: row.hash }).map(toFileChange),
    }));
  }

  getFileChanges(opts?: { path?: string; commitHash?: string }): StoredFileChange[] {
    return this.changeRows(opts).map(row => ({ commitHash: row.commit_hash, ...toFileChange(row) }));
  }

  private changeRows(opts?: { path?: string; commitHash?: string }): FileChangeRow[] {
    let sql = 'SELECT * FROM file_changes WHERE 1=1';
    const params: unknown[] = [];

    if (opts?.path) {
      sql += ' AND path = ?';
      params.push(opts.path);
    }
    if (opts?.commitHash) {
      sql += ' AND commit_hash = ?';
      params.push(opts.commitHash);
    }

    sql += ' ORDER BY id ASC';

    return this.db.prepare(sql).all(...params) as FileChangeRow[];
  }

  query(sql: string): unknown[] {
    return this.db.prepare(sql).all();
  }

  close(): void {
    this.db.close();
  }
}
