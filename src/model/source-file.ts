import type { TypeDeclaration } from './type-declaration.js';

export interface SourceFile {
  /** Path as given by the caller (repository-relative when coming from git) */
  path: string;
  fileName: string;
  packageName?: string;
  imports: string[];
  types: TypeDeclaration[];
  lineCount: number;
  parsed: boolean;
  parseError?: string;
}
