import type { SourceFile } from '../model/source-file.js';
import type { TypeKind } from '../model/type-declaration.js';
import { walkTypes } from '../model/type-declaration.js';
import type { ParserRegistry } from './registry.js';
import { extractTypeDeclarations, extractImports } from './extractor.js';
import { fileNameOf } from '../utils/path.js';
import { createContextLogger } from '../utils/logger.js';

const log = createContextLogger('analyzer');

export interface SourceInput {
  path: string;
  content: string;
}

export interface AnalyzeOptions {
  onProgress?: (done: number, total: number, path: string) => void;
}

export interface AnalysisSummary {
  files: number;
  parsed: number;
  failed: number;
  classes: number;
  interfaces: number;
  enums: number;
  records: number;
  annotations: number;
  methods: number;
  fields: number;
}

function countLines(content: string): number {
  if (content.length === 0) return 0;
  const lines = content.split(/\r\n|\r|\n/);
  return content.endsWith('\n') ? lines.length - 1 : lines.length;
}

/**
 * Parses one file and extracts its declarations. Parse failures are recorded
 * on the returned record, never thrown.
 */
export function analyzeSource(content: string, filePath: string, registry: ParserRegistry): SourceFile {
  const base = {
    path: filePath,
    fileName: fileNameOf(filePath),
    lineCount: countLines(content),
  };

  const plugin = registry.getPlugin(filePath);
  if (!plugin) {
    return { ...base, imports: [], types: [], parsed: false, parseError: `No parser registered for ${filePath}` };
  }

  const outcome = plugin.parse(content, filePath);
  if (!outcome.ok) {
    log.warn(`Skipping ${filePath}: ${outcome.error}`);
    return { ...base, imports: [], types: [], parsed: false, parseError: outcome.error };
  }

  const unit = outcome.value;
  return {
    ...base,
    packageName: unit.packageName,
    imports: extractImports(unit),
    types: extractTypeDeclarations(unit, unit.packageName),
    parsed: true,
  };
}

export function analyzeSources(
  inputs: SourceInput[],
  registry: ParserRegistry,
  options: AnalyzeOptions = {},
): SourceFile[] {
  const files: SourceFile[] = [];
  let done = 0;

  for (const input of inputs) {
    files.push(analyzeSource(input.content, input.path, registry));
    done++;
    options.onProgress?.(done, inputs.length, input.path);
    log.debug(`Analyzed ${done}/${inputs.length} ${input.path}`);
  }

  return files;
}

const KIND_KEYS: Record<TypeKind, 'classes' | 'interfaces' | 'enums' | 'records' | 'annotations'> = {
  class: 'classes',
  interface: 'interfaces',
  enum: 'enums',
  record: 'records',
  annotation: 'annotations',
};

export function summarizeAnalysis(files: SourceFile[]): AnalysisSummary {
  const summary: AnalysisSummary = {
    files: files.length,
    parsed: 0,
    failed: 0,
    classes: 0,
    interfaces: 0,
    enums: 0,
    records: 0,
    annotations: 0,
    methods: 0,
    fields: 0,
  };

  for (const file of files) {
    if (file.parsed) summary.parsed++;
    else summary.failed++;

    for (const type of walkTypes(file.types)) {
      summary[KIND_KEYS[type.kind]]++;
      summary.methods += type.methods.length;
      summary.fields += type.fields.length;
    }
  }

  return summary;
}
