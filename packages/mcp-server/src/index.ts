#!/usr/bin/env node
/**
 * stimshape MCP Server
 *
 * Wraps the shape kernel as 12 callable tools for LLM agents.
 * Runs over stdio transport; logs go to stderr so stdout stays protocol-only.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';

const server = new McpServer({
  name: 'stimshape',
  version: '0.1.0',
});

registerTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);
console.error('[stimshape] MCP server listening on stdio');
