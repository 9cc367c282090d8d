import { createRequire } from 'node:module';
import type { TreeSitterTree } from './lowering.js';
import { GrammarUnavailableError, errorMessage } from '../../../utils/errors.js';

const require = createRequire(import.meta.url);

export interface TreeSitterParser {
  setLanguage(language: unknown): void;
  parse(input: string, oldTree?: TreeSitterTree, options?: { bufferSize?: number }): TreeSitterTree;
}

type ParserConstructor = new () => TreeSitterParser;

interface LoadedGrammar {
  Parser: ParserConstructor;
  language: unknown;
}

// Native modules are loaded on first use and cached for the process
let loaded: LoadedGrammar | undefined;

export function loadJavaGrammar(): LoadedGrammar {
  if (loaded) {
    return loaded;
  }

  try {
    const Parser: ParserConstructor = require('tree-sitter');
    const language: unknown = require('tree-sitter-java');
    loaded = { Parser, language };
    return loaded;
  } catch (err) {
    throw new GrammarUnavailableError(`Failed to load tree-sitter Java grammar: ${errorMessage(err)}`);
  }
}

export function createJavaParser(): TreeSitterParser {
  const { Parser, language } = loadJavaGrammar();
  const parser = new Parser();
  parser.setLanguage(language);
  return parser;
}
