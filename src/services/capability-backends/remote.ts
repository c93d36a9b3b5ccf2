import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { McpCapabilityClient } from './mcp-client.js';

export type RemoteTransportKind = 'sse' | 'streamable-http';

/** Talks to a hosted provider over a long-lived streaming HTTP connection. */
export class RemoteCapabilityClient extends McpCapabilityClient {
  constructor(
    name: string,
    private readonly url: string,
    private readonly transport: RemoteTransportKind = 'sse',
  ) {
    super(name);
  }

  protected createTransport(): Transport {
    const endpoint = new URL(this.url);
    this.log.debug('Opening remote stream', { host: endpoint.host, transport: this.transport });
    return this.transport === 'sse'
      ? new SSEClientTransport(endpoint)
      : new StreamableHTTPClientTransport(endpoint);
  }
}
