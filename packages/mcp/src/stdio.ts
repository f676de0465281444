import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createLogger, errorMessage } from '@openapi-scout/core';
import { createMCPServer } from './mcp-server.js';
import type { CatalogRuntime } from './runtime.js';

const log = createLogger('mcp');

/**
 * Serve the runtime's catalog over stdio. SIGHUP reloads the document;
 * a failed reload is logged by the runtime and the old catalog stays live.
 */
export async function serveStdio(runtime: CatalogRuntime): Promise<McpServer> {
  const server = createMCPServer({ engine: runtime.engine });

  process.on('SIGHUP', () => {
    log.info('SIGHUP received, reloading OpenAPI document');
    runtime.reload().catch(error => log.debug('Reload rejected', { error: errorMessage(error) }));
  });

  const index = runtime.store.current();
  log.info(`Serving ${index.title} ${index.version}: ${index.stats.operationCount} operations over stdio`);

  await server.connect(new StdioServerTransport());
  return server;
}
