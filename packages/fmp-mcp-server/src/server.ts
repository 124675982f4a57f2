import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FmpClient } from './client.js';
import { registerQuoteTools } from './tools/quotes.js';
import { registerProfileTools } from './tools/profiles.js';
import { registerNewsTools } from './tools/news.js';

export const SERVER_NAME = 'fmp-market-data';
export const SERVER_VERSION = '1.0.0';

export function createFmpServer(client: FmpClient): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerQuoteTools(server, client);
  registerProfileTools(server, client);
  registerNewsTools(server, client);

  return server;
}
