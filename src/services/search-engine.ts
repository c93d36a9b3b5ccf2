export interface SearchResult {
  title: string;
  url: string;
  /** Page text, truncated by the engine. */
  text: string;
  publishedDate?: string;
}

export interface SearchOptions {
  numResults?: number;
  /** ISO-8601 lower bound on the publication date. */
  startPublishedDate?: string;
  endPublishedDate?: string;
}

export interface SearchEngine {
  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;
  name: string;
}

export class SearchService {
  private engine: SearchEngine;

  constructor(engine: SearchEngine) {
    this.engine = engine;
  }

  async search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    return this.engine.search(query, options);
  }

  getEngineName(): string {
    return this.engine.name;
  }
}
