import type { StructureParserPlugin } from './plugin.js';
import { getExtension } from '../utils/path.js';

/** Maps source-file extensions to the structure parser that lowers them. */
export class ParserRegistry {
  private plugins = new Map<string, StructureParserPlugin>();
  private extensionMap = new Map<string, string>(); // ext → plugin id

  register(plugin: StructureParserPlugin): void {
    this.plugins.set(plugin.id, plugin);
    for (const ext of plugin.extensions) {
      this.extensionMap.set(ext, plugin.id);
    }
  }

  /** Plugin for the file's extension; undefined when no plugin claims it. */
  getPlugin(filePath: string): StructureParserPlugin | undefined {
    const pluginId = this.extensionMap.get(getExtension(filePath));
    return pluginId ? this.plugins.get(pluginId) : undefined;
  }

  getPluginById(id: string): StructureParserPlugin | undefined {
    return this.plugins.get(id);
  }

  listPlugins(): StructureParserPlugin[] {
    return Array.from(this.plugins.values());
  }

  supportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }
}
