/**
 * Chest X-ray Report Retrieval MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes similar-report search, disease classification and report synthesis.
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
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './server/register-tools.js';
import { applyStartupConfig, warmIndexInBackground } from './server/startup.js';

// Load .env from the first candidate that exists:
// 1. CXR_RAG_ENV_FILE (explicit override)
// 2. CWD/.env
// 3. Package root/.env
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.CXR_RAG_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

// =============================================================================
// SERVER INITIALIZATION
// =============================================================================

const server = new McpServer({
  name: 'cxr-report-rag',
  version: '1.0.0',
});

const toolCount = registerAllTools(server);

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  const config = applyStartupConfig();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('CXR Report RAG MCP Server running on stdio');
  console.error(`Tools registered: ${toolCount}`);

  if (config.buildOnStart) {
    warmIndexInBackground();
  }
}

// Log memory usage every 5 minutes (stderr only - safe for MCP)
setInterval(() => {
  const mem = process.memoryUsage();
  console.error(
    `[Memory] RSS=${(mem.rss / 1024 / 1024).toFixed(1)}MB ` +
      `Heap=${(mem.heapUsed / 1024 / 1024).toFixed(1)}/${(mem.heapTotal / 1024 / 1024).toFixed(1)}MB`
  );
}, 300_000).unref();

function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down...`);
  server
    .close()
    .then(() => {
      console.error('[Shutdown] Server closed');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error instanceof Error ? error.message : error);
  process.exit(1);
});
