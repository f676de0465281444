#!/usr/bin/env node

/**
 * openapi-scout MCP server
 *
 * Exposes an OpenAPI-described REST API to MCP clients through progressive
 * tool discovery.
 *
 * Usage:
 *   openapi-scout-mcp --url http://localhost:8989 --api-key <key>
 *   openapi-scout-mcp --openapi ./openapi.yaml
 *   openapi-scout-mcp --config ./scout.yaml
 *
 * MCP client config:
 *   {
 *     "mcpServers": {
 *       "media-server": {
 *         "command": "npx",
 *         "args": ["tsx", "packages/mcp/src/server.ts", "--url", "http://localhost:8989"],
 *         "env": { "UPSTREAM_API_KEY": "<key>" }
 *       }
 *     }
 *   }
 */

import { ConfigError, loadConfig, parseServerArgs } from './config.js';
import { createCatalogRuntime } from './runtime.js';
import { serveStdio } from './stdio.js';

const HELP = `
openapi-scout MCP server: progressive tool discovery over an OpenAPI document

Usage:
  openapi-scout-mcp --url <base-url>          # Upstream API base URL
  openapi-scout-mcp --api-key <key>           # Upstream API key (sent as X-Api-Key)
  openapi-scout-mcp --openapi <file-or-url>   # OpenAPI document (default: bundled media-server)
  openapi-scout-mcp --config <file>           # YAML or JSON config file
  openapi-scout-mcp --log-level <level>       # debug, info, warn or error

Environment: UPSTREAM_URL, UPSTREAM_API_KEY, UPSTREAM_API_KEY_HEADER,
UPSTREAM_TIMEOUT_MS, OPENAPI_SOURCE, OPENAPI_SCOUT_CONFIG, LOG_LEVEL.
Send SIGHUP to reload the OpenAPI document.
`;

async function main() {
  const args = parseServerArgs(process.argv.slice(2));
  if (args.help) {
    console.error(HELP);
    process.exit(0);
  }

  const config = loadConfig({ configPath: args.configPath, overrides: args.overrides });
  const runtime = await createCatalogRuntime(config);
  await serveStdio(runtime);
}

main().catch(err => {
  if (err instanceof ConfigError) {
    console.error(err.message);
    console.error('Run: openapi-scout-mcp --help');
  } else {
    console.error('Fatal:', err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
