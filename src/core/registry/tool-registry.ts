// Tool registry keyed by tool name, with aliases resolving to the same definition

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export type ToolHandler = (args: unknown) => Promise<unknown>;

export interface IToolDefinition {
  tool: Tool;
  handler: ToolHandler;
  aliases?: string[];
}

export class ToolRegistry {
  private readonly tools = new Map<string, IToolDefinition>();
  private readonly aliases = new Map<string, string>();

  register(definition: IToolDefinition): void {
    const name = definition.tool.name;
    const aliases = definition.aliases ?? [];
    if (this.tools.has(name) || this.aliases.has(name)) {
      throw new Error(`Tool already registered: ${name}`);
    }
    for (const alias of aliases) {
      if (this.tools.has(alias) || this.aliases.has(alias)) {
        throw new Error(`Alias conflicts with existing tool: ${alias}`);
      }
    }

    this.tools.set(name, definition);
    for (const alias of aliases) {
      this.aliases.set(alias, name);
    }
  }

  get(name: string): IToolDefinition | undefined {
    return this.tools.get(this.aliases.get(name) ?? name);
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.get(name)?.handler;
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values()).map(d => d.tool);
  }

  size(): number {
    return this.tools.size;
  }
}
