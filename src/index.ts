#!/usr/bin/env node

/**
 * checkmk-rules-mcp - MCP server for managing CheckMK monitoring rules
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { RULE_TOOLS } from './schema.js';
import { loadConfig, validateConfig } from './config.js';
import { createToolRouter, routeToolCall } from './router.js';
import { RulesServer } from './server.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const { name, version } = z
  .object({ name: z.string(), version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8')));

// Create MCP server instance with tools capability
const server = new Server(
  {
    name,
    version,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// Load configuration
const config = loadConfig();
const problems = validateConfig(config);

// Show configuration on startup
console.error('🛠️ CheckMK Rules MCP Server Starting...');
console.error(`📋 Configuration:`);
console.error(`   - Server: ${config.connection.serverUrl || '(not set)'}`);
console.error(`   - Site: ${config.connection.site || '(not set)'}`);
console.error(`   - User: ${config.connection.username || '(not set)'}`);
console.error(`   - Timeout: ${config.connection.timeoutMs / 1000}s`);
console.error(`   - Debug: ${config.connection.debug ? 'Enabled' : 'Disabled'}`);

const rulesServer = new RulesServer(config);
const router = createToolRouter(rulesServer.routes());

// Expose tools
server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: RULE_TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) =>
  routeToolCall(router, request.params.name, request.params.arguments)
);

async function runServer() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('✅ CheckMK Rules MCP Server running on stdio');
  console.error(`🔧 ${router.size} tools available`);

  if (problems.length > 0) {
    console.error('⚠️ Connection settings incomplete; API tools will report:');
    for (const problem of problems) {
      console.error(`   - ${problem}`);
    }
  }
}

runServer().catch((error) => {
  console.error('Fatal error running server:', error);
  process.exit(1);
});
