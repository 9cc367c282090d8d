import type { CompilationUnitNode } from './syntax.js';
import type { Result } from '../utils/errors.js';

/** A parse either yields a lowered unit or a message explaining why not. */
export type ParseOutcome = Result<CompilationUnitNode>;

export interface StructureParserPlugin {
  id: string;
  extensions: string[];
  parse(content: string, filePath: string): ParseOutcome;
}
