import type { ToolArgs, ToolErrorKind } from '../types/workflow.js';
import { ConfigurationError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('capabilities');

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema: { type: 'object'; properties?: Record<string, unknown> };
}

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
}

export type ToolOutcome = { ok: true; output: string } | { ok: false; error: ToolError };

export interface InvokeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Uniform view of an external capability provider. Transport variants
 * (local subprocess, remote stream) implement the same call/response
 * semantics; a failed call is a value, never a throw.
 */
export interface CapabilityClient {
  readonly name: string;
  connect(): Promise<void>;
  listTools(): Promise<ToolDescriptor[]>;
  invoke(tool: string, args: ToolArgs, options?: InvokeOptions): Promise<ToolOutcome>;
  close(): Promise<void>;
}

/**
 * Composes several providers behind one client and routes each call to the
 * provider that advertised the tool.
 */
export class CapabilityRegistry implements CapabilityClient {
  public readonly name = 'registry';
  private readonly routes = new Map<string, CapabilityClient>();
  private readonly descriptors: ToolDescriptor[] = [];
  private connected = false;

  constructor(private readonly providers: CapabilityClient[]) {
    if (providers.length === 0) {
      throw new ConfigurationError('At least one capability provider must be configured');
    }
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    await Promise.all(this.providers.map((provider) => provider.connect()));

    for (const provider of this.providers) {
      const tools = await provider.listTools();
      for (const tool of tools) {
        const owner = this.routes.get(tool.name);
        if (owner) {
          throw new ConfigurationError(
            `Tool "${tool.name}" is offered by both "${owner.name}" and "${provider.name}"`,
          );
        }
        this.routes.set(tool.name, provider);
        this.descriptors.push(tool);
      }
      log.info('Provider tools registered', { provider: provider.name, tools: tools.map((t) => t.name) });
    }
    this.connected = true;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    await this.connect();
    return [...this.descriptors];
  }

  async invoke(tool: string, args: ToolArgs, options?: InvokeOptions): Promise<ToolOutcome> {
    await this.connect();
    const provider = this.routes.get(tool);
    if (!provider) {
      throw new ConfigurationError(`No capability provider offers tool "${tool}"`);
    }
    return provider.invoke(tool, args, options);
  }

  async close(): Promise<void> {
    const results = await Promise.allSettled(this.providers.map((provider) => provider.close()));
    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
        log.warn('Provider failed to close', { provider: this.providers[index].name, error: message });
      }
    }
    this.connected = false;
    this.routes.clear();
    this.descriptors.length = 0;
  }
}
