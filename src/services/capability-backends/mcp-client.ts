import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema, ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { CapabilityClient, InvokeOptions, ToolDescriptor, ToolError, ToolOutcome } from '../capability-client.js';
import type { ToolArgs } from '../../types/workflow.js';
import { isTransientError } from '../../errors.js';
import { createLogger, errorMessage, type Logger } from '../../logger.js';

const CLIENT_INFO = { name: 'content-supervisor', version: '1.0.0' };

/** Maps a thrown MCP/transport error onto the per-call error kinds. */
export function classifyInvokeError(error: unknown, signal?: AbortSignal): ToolError {
  const message = errorMessage(error);
  if (signal?.aborted) {
    return { kind: 'canceled', message };
  }
  if (error instanceof McpError) {
    if (error.code === ErrorCode.RequestTimeout) return { kind: 'timeout', message };
    if (error.code === ErrorCode.ConnectionClosed) return { kind: 'retryable', message };
    if (error.code === ErrorCode.InvalidParams || error.code === ErrorCode.MethodNotFound) {
      return { kind: 'failed', message };
    }
  }
  return { kind: isTransientError(error) ? 'retryable' : 'failed', message };
}

/**
 * MCP client shared by every transport variant. Subclasses only decide how
 * the transport is built.
 */
export abstract class McpCapabilityClient implements CapabilityClient {
  private client: Client | null = null;
  protected readonly log: Logger;

  constructor(public readonly name: string) {
    this.log = createLogger(`mcp:${name}`);
  }

  protected abstract createTransport(): Transport;

  async connect(): Promise<void> {
    if (this.client) return;
    const start = Date.now();
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(this.createTransport());
    this.client = client;
    this.log.info('Connected', { durationMs: Date.now() - start });
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const client = this.requireClient();
    const response = await client.listTools();
    return response.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { type: 'object', properties: tool.inputSchema.properties },
    }));
  }

  async invoke(tool: string, args: ToolArgs, options: InvokeOptions = {}): Promise<ToolOutcome> {
    const client = this.requireClient();
    const start = Date.now();
    try {
      const raw = await client.callTool({ name: tool, arguments: args }, undefined, {
        signal: options.signal,
        timeout: options.timeoutMs,
      });
      const parsed = CallToolResultSchema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, error: { kind: 'failed', message: `Malformed result from ${tool}` } };
      }

      const text = parsed.data.content
        .map((part) => (part.type === 'text' ? part.text : ''))
        .filter((part) => part.length > 0)
        .join('\n');

      if (parsed.data.isError) {
        this.log.warn('Tool reported an error', { tool, durationMs: Date.now() - start });
        return { ok: false, error: { kind: 'failed', message: text || `${tool} reported an error` } };
      }
      this.log.debug('Tool call complete', { tool, outputLength: text.length, durationMs: Date.now() - start });
      return { ok: true, output: text };
    } catch (error) {
      const classified = classifyInvokeError(error, options.signal);
      this.log.warn('Tool call failed', { tool, kind: classified.kind, error: classified.message });
      return { ok: false, error: classified };
    }
  }

  async close(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    await client.close();
    this.log.info('Disconnected');
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error(`Capability provider "${this.name}" is not connected`);
    }
    return this.client;
  }
}
