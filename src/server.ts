import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Config } from './config.js';
import type { FetchLike } from './http.js';
import { ProviderManager } from './providers/manager.js';
import { HELP_TEXT, HELP_URI } from './resources/help.js';
import { ToolRegistry } from './tools/registry.js';
import { registerStockImageTools } from './tools/stock-images.js';
import type { ApiKeys } from './types.js';

export const SERVER_NAME = 'mcp-stock-images';
export const SERVER_VERSION = '0.1.0';

export interface CreateServerOptions {
  config: Config;
  apiKeys: ApiKeys;
  fetch?: FetchLike;
}

/**
 * Create and configure the MCP server. The caller connects a transport.
 */
export function createServer(options: CreateServerOptions) {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } }
  );

  // Created on first tool call, so a server without keys still starts
  let providerManager: ProviderManager | null = null;
  const getProviderManager = (): ProviderManager => {
    if (!providerManager) {
      providerManager = new ProviderManager(options.config, options.apiKeys, { fetch: options.fetch });
    }
    return providerManager;
  };

  const tools = new ToolRegistry();
  registerStockImageTools(tools, getProviderManager);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.list(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
    tools.call(request.params.name, request.params.arguments, { signal: extra.signal })
  );

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [
      {
        uri: HELP_URI,
        name: 'Stock images help',
        description: 'How to use the stock image search tools',
        mimeType: 'text/markdown',
      },
    ],
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    if (request.params.uri !== HELP_URI) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${request.params.uri}`);
    }
    return {
      contents: [{ uri: HELP_URI, mimeType: 'text/markdown', text: HELP_TEXT }],
    };
  });

  return { server, tools, getProviderManager };
}
