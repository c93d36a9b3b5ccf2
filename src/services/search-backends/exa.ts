import { z } from 'zod';
import type { SearchEngine, SearchOptions, SearchResult } from '../search-engine.js';
import { ConfigurationError, RetryableToolError, ToolCallFailed } from '../../errors.js';
import { createLogger, errorMessage } from '../../logger.js';

const log = createLogger('exa');

const DEFAULT_BASE_URL = 'https://api.exa.ai';
const MAX_TEXT_CHARACTERS = 400;

const ExaResponse = z.object({
  results: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string(),
      text: z.string().nullish(),
      publishedDate: z.string().nullish(),
    }),
  ),
});

export interface ExaSearchEngineOptions {
  apiKey: string;
  baseUrl?: string;
}

/** News search with page text through the Exa search API. */
export class ExaSearchEngine implements SearchEngine {
  public readonly name = 'exa';
  private readonly baseUrl: string;

  constructor(private readonly options: ExaSearchEngineOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('EXA_API_KEY is required for the Exa search engine');
    }
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const numResults = options.numResults ?? 10;
    log.info('Searching', { query, numResults });
    const start = Date.now();

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/search`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-api-key': this.options.apiKey },
        body: JSON.stringify({
          query,
          useAutoprompt: false,
          numResults,
          category: 'news',
          startPublishedDate: options.startPublishedDate,
          endPublishedDate: options.endPublishedDate,
          contents: { text: { maxCharacters: MAX_TEXT_CHARACTERS } },
        }),
      });
    } catch (error) {
      throw new RetryableToolError(`Exa search failed for "${query}": ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const message = `Exa search failed for "${query}": ${response.status} ${await response.text()}`;
      log.error('Search failed', { query, status: response.status, durationMs: Date.now() - start });
      if (response.status === 429 || response.status >= 500) {
        throw new RetryableToolError(message);
      }
      throw new ToolCallFailed(message);
    }

    const data = ExaResponse.parse(await response.json());
    const results = data.results.map((hit) => ({
      title: hit.title?.trim() || hit.url,
      url: hit.url,
      text: (hit.text ?? '').slice(0, MAX_TEXT_CHARACTERS),
      ...(hit.publishedDate ? { publishedDate: hit.publishedDate } : {}),
    }));

    log.info('Search complete', { query, resultsFound: results.length, durationMs: Date.now() - start });
    return results;
  }
}
