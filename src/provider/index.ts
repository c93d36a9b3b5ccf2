#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createProviderServer } from './server.js';
import { ExaSearchEngine } from '../services/search-backends/exa.js';
import { loadConfig } from '../config.js';
import { setLogLevel, createLogger, errorMessage } from '../logger.js';

const log = createLogger('provider-main');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Starting content search provider', {
    nodeVersion: process.version,
    pid: process.pid,
    logLevel: config.logLevel,
  });

  const server = createProviderServer(new ExaSearchEngine({ apiKey: config.exaApiKey }));
  const transport = new StdioServerTransport();

  const shutdown = async () => {
    log.info('Shutting down...');
    try {
      await server.close();
    } catch (error) {
      log.error('Error during shutdown', { error: errorMessage(error) });
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection', { error: errorMessage(reason) });
  });

  await server.connect(transport);
  log.info('Provider connected and ready');
}

main().catch((error: unknown) => {
  log.error('Failed to start provider', { error: errorMessage(error) });
  process.exit(1);
});
