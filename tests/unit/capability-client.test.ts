import { describe, it, expect, afterEach } from 'vitest';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { McpCapabilityClient, classifyInvokeError } from '../../src/services/capability-backends/mcp-client.js';
import { CapabilityRegistry, type CapabilityClient } from '../../src/services/capability-client.js';
import { createProviderServer } from '../../src/provider/server.js';
import type { SearchEngine, SearchOptions, SearchResult } from '../../src/services/search-engine.js';
import { ConfigurationError } from '../../src/errors.js';
import { FakeCapabilities } from '../helpers/fakes.js';

class StubSearchEngine implements SearchEngine {
  readonly name = 'stub';
  readonly queries: Array<{ query: string; options?: SearchOptions }> = [];

  constructor(private readonly results: SearchResult[] | Error) {}

  async search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    this.queries.push({ query, options });
    if (this.results instanceof Error) throw this.results;
    return this.results;
  }
}

/** MCP client over a transport handed in by the test. */
class LinkedCapabilityClient extends McpCapabilityClient {
  constructor(private readonly transport: Transport) {
    super('linked');
  }

  protected createTransport(): Transport {
    return this.transport;
  }
}

const HIT: SearchResult = {
  title: 'Central bank holds rates',
  url: 'https://news.example.com/rates',
  text: 'The bank held rates.',
  publishedDate: '2026-02-27T00:00:00.000Z',
};

const ARGS = {
  query: 'interest rates',
  start_published_date: '2026-01-31T00:00:00.000Z',
  end_published_date: '2026-03-02T09:30:00.000Z',
};

describe('McpCapabilityClient against the local provider', () => {
  let server: McpServer | undefined;
  let client: LinkedCapabilityClient | undefined;

  async function connect(engine: SearchEngine): Promise<LinkedCapabilityClient> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createProviderServer(engine);
    await server.connect(serverTransport);
    client = new LinkedCapabilityClient(clientTransport);
    await client.connect();
    return client;
  }

  afterEach(async () => {
    await client?.close();
    await server?.close();
    client = undefined;
    server = undefined;
  });

  it('lists the search tool', async () => {
    const linked = await connect(new StubSearchEngine([HIT]));

    const tools = await linked.listTools();

    expect(tools.map((t) => t.name)).toEqual(['search_and_content']);
    expect(Object.keys(tools[0].inputSchema.properties ?? {}).sort()).toEqual([
      'end_published_date',
      'query',
      'start_published_date',
    ]);
  });

  it('returns the search results as text', async () => {
    const engine = new StubSearchEngine([HIT]);
    const linked = await connect(engine);

    const outcome = await linked.invoke('search_and_content', ARGS);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(JSON.parse(outcome.output)).toEqual({ results: [HIT] });
    expect(engine.queries).toEqual([
      {
        query: 'interest rates',
        options: {
          numResults: 10,
          startPublishedDate: '2026-01-31T00:00:00.000Z',
          endPublishedDate: '2026-03-02T09:30:00.000Z',
        },
      },
    ]);
  });

  it('turns a provider-side error into a failed outcome', async () => {
    const linked = await connect(new StubSearchEngine(new Error('quota exhausted')));

    const outcome = await linked.invoke('search_and_content', ARGS);

    expect(outcome).toEqual({ ok: false, error: { kind: 'failed', message: 'quota exhausted' } });
  });

  it('fails a call with missing arguments without throwing', async () => {
    const linked = await connect(new StubSearchEngine([HIT]));

    const outcome = await linked.invoke('search_and_content', { query: 'interest rates' });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('failed');
  });
});

describe('classifyInvokeError', () => {
  it('maps protocol errors onto call outcomes', () => {
    expect(classifyInvokeError(new McpError(ErrorCode.RequestTimeout, 'timed out')).kind).toBe('timeout');
    expect(classifyInvokeError(new McpError(ErrorCode.ConnectionClosed, 'closed')).kind).toBe('retryable');
    expect(classifyInvokeError(new McpError(ErrorCode.InvalidParams, 'bad args')).kind).toBe('failed');
    expect(classifyInvokeError(new Error('read ECONNRESET')).kind).toBe('retryable');
  });

  it('treats a 5xx as transient only where it is a status code', () => {
    expect(classifyInvokeError(new Error('SSE error: Non-200 status code (503)')).kind).toBe('retryable');
    expect(classifyInvokeError(new Error('Error POSTing to endpoint (HTTP 502)')).kind).toBe('retryable');
    expect(classifyInvokeError(new Error('LLM API error 400: max_tokens must be at most 512')).kind).toBe('failed');
  });

  it('reports a call interrupted by cancellation as canceled', () => {
    const controller = new AbortController();
    controller.abort();

    expect(classifyInvokeError(new Error('This operation was aborted'), controller.signal).kind).toBe('canceled');
  });
});

describe('CapabilityRegistry', () => {
  const search = () => new FakeCapabilities({ search_and_content: () => ({ ok: true, output: 'searched' }) });
  const publish = () => new FakeCapabilities({ create_post: () => ({ ok: true, output: 'posted' }) });

  it('routes each call to the provider that offers the tool', async () => {
    const searchProvider = search();
    const publishProvider = publish();
    const registry = new CapabilityRegistry([searchProvider, publishProvider]);

    expect((await registry.listTools()).map((t) => t.name)).toEqual(['search_and_content', 'create_post']);
    expect(await registry.invoke('create_post', {})).toEqual({ ok: true, output: 'posted' });
    expect(searchProvider.calls).toHaveLength(0);
    expect(publishProvider.calls).toHaveLength(1);
  });

  it('rejects a tool offered by two providers', async () => {
    await expect(new CapabilityRegistry([search(), search()]).connect()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a call to a tool nobody offers', async () => {
    await expect(new CapabilityRegistry([search()]).invoke('create_post', {})).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('closes every provider even when one fails to close', async () => {
    const healthy = search();
    const broken: CapabilityClient = {
      name: 'broken',
      connect: async () => undefined,
      listTools: async () => [],
      invoke: async () => ({ ok: true, output: '' }),
      close: async () => {
        throw new Error('already gone');
      },
    };

    await new CapabilityRegistry([broken, healthy]).close();

    expect(healthy.closed).toBe(true);
  });

  it('needs at least one provider', () => {
    expect(() => new CapabilityRegistry([])).toThrow(ConfigurationError);
  });
});
