// Model types
export type {
  TypeDeclaration,
  TypeKind,
  FieldMember,
  MethodMember,
  Parameter,
  Visibility,
} from './model/type-declaration.js';
export {
  qualify,
  visibilityOf,
  lineSpan,
  fullParameterType,
  parameterSignature,
  fieldSignature,
  methodSignature,
  shortSignature,
  typeSignature,
  constructorsOf,
  regularMethodsOf,
  publicMethodsOf,
  publicFieldsOf,
  walkTypes,
  countMethods,
} from './model/type-declaration.js';
export type { Commit, CommitInit, FileChange, FileChangeKind, PersonIdent } from './model/commit.js';
export {
  createCommit,
  shortHashOf,
  subjectOf,
  totalLinesAdded,
  totalLinesDeleted,
  changesOfKind,
  touchesPath,
  authorLabel,
  changeFileName,
  isSourceFile,
} from './model/commit.js';
export type { SourceFile } from './model/source-file.js';

// Parser system
export type * from './parser/syntax.js';
export type { StructureParserPlugin, ParseOutcome } from './parser/plugin.js';
export { ParserRegistry } from './parser/registry.js';
export { createDefaultRegistry } from './parser/plugins/index.js';
export { JavaParserPlugin } from './parser/plugins/java/index.js';
export { parseJavadoc } from './parser/plugins/java/javadoc.js';
export { extractTypeDeclarations, extractImports } from './parser/extractor.js';
export { analyzeSource, analyzeSources, summarizeAnalysis } from './parser/analyzer.js';
export type { SourceInput, AnalyzeOptions, AnalysisSummary } from './parser/analyzer.js';

// Git
export { GitBridge, EMPTY_TREE_HASH } from './git/bridge.js';
export type {
  RawCommit,
  RawPerson,
  TreeRef,
  TreeDiffEntry,
  EditSpan,
  WalkOptions,
  DiffFormatter,
  DiffFormatterOptions,
  RepositoryHandle,
} from './git/types.js';
export { parseLogOutput, parseNameStatus, parseUnifiedDiff } from './git/diff-reader.js';
export {
  extractHistory,
  computeFileChanges,
  commitsForPath,
  commitsByAuthor,
  openRepository,
  withRepository,
} from './git/history.js';
export type { HistoryOptions, RepositoryConnection } from './git/history.js';

// Analysis
export { commitsForFile, joinHistory, pathsMatch } from './analysis/aggregator.js';
export type { FileHistory } from './analysis/aggregator.js';
export {
  authorCommitCounts,
  fileChangeCounts,
  mostChangedFiles,
  lineTotals,
  summarizeHistory,
  rank,
} from './analysis/stats.js';
export type { RankedEntry, LineTotals, HistorySummary } from './analysis/stats.js';
export { analyzeProject, analyzeStructure, analyzeDirectory, discoverSources, walkSources } from './analysis/project.js';
export type { ProjectAnalysis, ProjectOptions } from './analysis/project.js';

// Configuration
export { loadConfig, parseConfig, defaultConfig, shouldExclude, CONFIG_FILE } from './config/config.js';
export type { DocModelConfig, ConfigOverrides } from './config/config.js';

// Storage
export { DocDatabase } from './storage/database.js';
export type { StoredType, StoredMember, StoredFileChange } from './storage/database.js';

// Utilities
export {
  DocModelError,
  InvalidArgumentError,
  RepositoryClosedError,
  GrammarUnavailableError,
  BinaryContentError,
  ConfigError,
  errorMessage,
} from './utils/errors.js';
export type { Result } from './utils/errors.js';
export { createContextLogger, setLogLevel } from './utils/logger.js';
export { normalizeFilePath, getExtension, fileNameOf } from './utils/path.js';
