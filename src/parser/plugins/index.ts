import { ParserRegistry } from '../registry.js';
import { JavaParserPlugin } from './java/index.js';

export function createDefaultRegistry(): ParserRegistry {
  const registry = new ParserRegistry();
  registry.register(new JavaParserPlugin());
  return registry;
}
