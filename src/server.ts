import type { ServerConfig } from './types.js';
import { loadDocumentStore } from './corpus/loader.js';
import { QueryEngine } from './query/engine.js';
import { ConceptCatalog } from './concepts/catalog.js';
import { LayoutEngine } from './generators/layouts.js';
import { ToolRegistry } from './tool-registry.js';
import { RequestDispatcher, type ServerInfo } from './protocol/dispatcher.js';

export const SERVER_INFO: ServerInfo = { name: 'daisyui-docs-mcp', version: '1.0.0' };

/**
 * Builds every read-only collaborator once and wires them into a dispatcher.
 * Nothing built here is mutated afterwards.
 */
export function createServer(config: ServerConfig): RequestDispatcher {
  const registry = new ToolRegistry();
  registry.verify();

  const store = loadDocumentStore(config.corpus);
  const context = {
    engine: new QueryEngine(store, config.ranking),
    concepts: new ConceptCatalog(),
    layouts: new LayoutEngine(),
  };

  return new RequestDispatcher({ registry, context, serverInfo: SERVER_INFO });
}
