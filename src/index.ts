#!/usr/bin/env node
/**
 * Compliance Ingest MCP Server
 *
 * Entry point for the MCP server using stdio transport. Exposes database,
 * ingestion and run audit tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from the first candidate that exists:
// 1. COMPLIANCE_INGEST_ENV_FILE (explicit override)
// 2. CWD/.env
// 3. Package root/.env
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.COMPLIANCE_INGEST_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './server/register-tools.js';
import { updateConfig } from './server/state.js';
import { loadConfig } from './utils/config.js';

// =============================================================================
// SERVER INITIALIZATION
// =============================================================================

const server = new McpServer({
  name: 'compliance-ingest-mcp',
  version: '1.0.0',
});

const toolCount = registerAllTools(server);

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  // Throws ConfigurationError on invalid COMPLIANCE_INGEST_* values
  const config = loadConfig();
  updateConfig(config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Compliance Ingest MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}`);
  console.error(`Databases: ${config.databasesPath}`);
  console.error(`Raw data: ${config.rawDataPath}`);
}

function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${String(err)}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
