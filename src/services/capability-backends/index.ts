import type { ProviderConfig } from '../../config.js';
import { CapabilityRegistry, type CapabilityClient } from '../capability-client.js';
import { StdioCapabilityClient } from './stdio.js';
import { RemoteCapabilityClient } from './remote.js';

export function createProvider(config: ProviderConfig): CapabilityClient {
  switch (config.transport) {
    case 'stdio':
      return new StdioCapabilityClient(config.name, { command: config.command, args: config.args, env: config.env });
    case 'sse':
    case 'streamable-http':
      return new RemoteCapabilityClient(config.name, config.url, config.transport);
  }
}

/** Builds the registry over every configured provider; the transport of each is fixed here. */
export function createCapabilityRegistry(configs: ProviderConfig[]): CapabilityRegistry {
  return new CapabilityRegistry(configs.map(createProvider));
}
