import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SearchService } from '../../services/search-engine.js';
import { createLogger, errorMessage } from '../../logger.js';

const log = createLogger('tool:search_and_content');

export const SEARCH_AND_CONTENT_TOOL = 'search_and_content';

export function registerSearchAndContentTool(server: McpServer, searchService: SearchService): void {
  server.tool(
    SEARCH_AND_CONTENT_TOOL,
    'Search recent news for a query and return each hit with its title, URL, publication date and the start of its text.',
    {
      query: z.string().min(1).describe('Search query'),
      start_published_date: z.string().describe('Only return results published after this ISO-8601 timestamp'),
      end_published_date: z.string().describe('Only return results published before this ISO-8601 timestamp'),
    },
    async ({ query, start_published_date, end_published_date }) => {
      try {
        const results = await searchService.search(query, {
          numResults: 10,
          startPublishedDate: start_published_date,
          endPublishedDate: end_published_date,
        });
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ results }, null, 2) }],
        };
      } catch (error) {
        const message = errorMessage(error);
        log.error('Search failed', { query, engine: searchService.getEngineName(), error: message });
        return {
          content: [{ type: 'text' as const, text: message }],
          isError: true,
        };
      }
    },
  );
}
