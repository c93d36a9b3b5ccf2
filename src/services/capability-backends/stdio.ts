import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { McpCapabilityClient } from './mcp-client.js';

export interface StdioProviderOptions {
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

/** Spawns the provider as a child process and speaks MCP over its stdio. */
export class StdioCapabilityClient extends McpCapabilityClient {
  constructor(
    name: string,
    private readonly options: StdioProviderOptions,
  ) {
    super(name);
  }

  protected createTransport(): Transport {
    this.log.debug('Spawning provider', { command: this.options.command, args: this.options.args ?? [] });
    return new StdioClientTransport({
      command: this.options.command,
      args: this.options.args ?? [],
      env: { ...getDefaultEnvironment(), ...this.options.env },
      stderr: 'inherit',
    });
  }
}
