import type { StructureParserPlugin, ParseOutcome } from '../../plugin.js';
import type { TreeSitterParser } from './grammar-loader.js';
import type { TreeSitterTree } from './lowering.js';
import { createJavaParser } from './grammar-loader.js';
import { lowerCompilationUnit, findSyntaxError } from './lowering.js';
import { errorMessage } from '../../../utils/errors.js';
import { createContextLogger } from '../../../utils/logger.js';

const log = createContextLogger('java-parser');

// node-tree-sitter reads string input through a fixed-size buffer
const MIN_BUFFER_SIZE = 32 * 1024;

export class JavaParserPlugin implements StructureParserPlugin {
  id = 'java';
  extensions = ['.java'];

  private parser: TreeSitterParser | undefined;

  parse(content: string, filePath: string): ParseOutcome {
    if (content.length === 0) {
      return { ok: false, error: 'No content to parse' };
    }

    let tree: TreeSitterTree;
    try {
      this.parser ??= createJavaParser();
      tree = this.parser.parse(content, undefined, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, content.length * 2),
      });
    } catch (err) {
      log.warn(`Could not parse ${filePath}`, { error: errorMessage(err) });
      return { ok: false, error: errorMessage(err) };
    }

    const syntaxError = findSyntaxError(tree.rootNode);
    if (syntaxError) {
      const line = syntaxError.startPosition.row + 1;
      log.debug(`Syntax error in ${filePath} at line ${line}`);
      return { ok: false, error: `Parse failed: syntax error at line ${line}` };
    }

    return { ok: true, value: lowerCompilationUnit(tree.rootNode) };
  }
}
