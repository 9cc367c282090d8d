export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS types (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_path TEXT NOT NULL,
  qualified_name TEXT NOT NULL,
  name TEXT NOT NULL,
  kind TEXT NOT NULL,
  package_name TEXT,
  parent_name TEXT,
  modifiers TEXT NOT NULL,
  super_class TEXT,
  interfaces TEXT NOT NULL,
  type_parameters TEXT NOT NULL,
  annotations TEXT NOT NULL,
  documentation TEXT,
  start_line INTEGER NOT NULL,
  end_line INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_types_file ON types(file_path);
CREATE INDEX IF NOT EXISTS idx_types_kind ON types(kind);
CREATE INDEX IF NOT EXISTS idx_types_name ON types(qualified_name);

CREATE TABLE IF NOT EXISTS members (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_path TEXT NOT NULL,
  type_name TEXT NOT NULL,
  member_kind TEXT NOT NULL,
  name TEXT NOT NULL,
  signature TEXT NOT NULL,
  documentation TEXT,
  start_line INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_members_file ON members(file_path);
CREATE INDEX IF NOT EXISTS idx_members_type ON members(type_name);

CREATE TABLE IF NOT EXISTS commits (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  hash TEXT NOT NULL UNIQUE,
  author_name TEXT NOT NULL,
  author_email TEXT NOT NULL,
  author_time TEXT NOT NULL,
  committer_name TEXT NOT NULL,
  committer_email TEXT NOT NULL,
  committer_time TEXT NOT NULL,
  message TEXT NOT NULL,
  parent_hashes TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_commits_author ON commits(author_name);

CREATE TABLE IF NOT EXISTS file_changes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  commit_hash TEXT NOT NULL,
  path TEXT NOT NULL,
  old_path TEXT,
  kind TEXT NOT NULL,
  lines_added INTEGER NOT NULL DEFAULT 0,
  lines_deleted INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_file_changes_commit ON file_changes(commit_hash);
CREATE INDEX IF NOT EXISTS idx_file_changes_path ON file_changes(path);

CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
