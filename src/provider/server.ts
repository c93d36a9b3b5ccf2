import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SearchService, type SearchEngine } from '../services/search-engine.js';
import { registerSearchAndContentTool } from './tools/search-and-content.js';
import { createLogger } from '../logger.js';

const log = createLogger('provider');

/** The local capability provider: an MCP server offering the news search tool. */
export function createProviderServer(engine: SearchEngine): McpServer {
  const server = new McpServer({
    name: 'content-search-provider',
    version: '1.0.0',
  });

  registerSearchAndContentTool(server, new SearchService(engine));
  log.info('search_and_content tool registered', { engine: engine.name });

  return server;
}
