#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadApiKeys, loadConfig } from './config-loader.js';
import { logger } from './logger.js';
import { createServer, SERVER_NAME } from './server.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const apiKeys = loadApiKeys();
  const { server, getProviderManager } = createServer({ config, apiKeys });

  await server.connect(new StdioServerTransport());

  const status = getProviderManager().getProviderStatus();
  const configured = status.providers
    .filter((entry) => entry.configured)
    .map((entry) => entry.provider);

  logger.success(`${SERVER_NAME} started on stdio`);
  logger.info(`Providers: ${configured.length > 0 ? configured.join(', ') : 'none configured'}`);
  logger.info(`Attribution links: ${config.enableAttributionLinks ? 'on' : 'off'}`);
  if (!status.anyConfigured) {
    logger.warn('No API keys found. Set PEXELS_API_KEY, UNSPLASH_ACCESS_KEY or PIXABAY_API_KEY');
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
