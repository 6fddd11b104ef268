import { checkApiKeyExists, WEB_SEARCH_API_KEY } from '../utils/env.js';
import { createCodeExecutorTool } from './code/index.js';
import { createReadFileTool } from './files/read-file.js';
import { createWebSearchTool } from './search/tavily.js';
import { ToolRegistry } from './types.js';

export interface DefaultToolOptions {
  /** Directory `read_file` is confined to. */
  root?: string;
}

/**
 * The tools available to agents. Web search is only registered when its API
 * key is configured.
 */
export function createDefaultRegistry(options: DefaultToolOptions = {}): ToolRegistry {
  const registry = new ToolRegistry([
    createCodeExecutorTool(),
    createReadFileTool(options.root),
  ]);
  if (checkApiKeyExists(WEB_SEARCH_API_KEY)) {
    registry.register(createWebSearchTool());
  }
  return registry;
}

export { ToolRegistry, declareTool } from './types.js';
export type { DeclareToolOptions, ToolDeclaration, ToolError, ToolErrorKind } from './types.js';
