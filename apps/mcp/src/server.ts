import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from '@config';
import { ConfigurationError } from '@errors';
import { getLogger } from '@kernel/logger';
import { registerShutdownHandler, setupShutdownHandlers } from '@shutdown';

import { Container } from './container';
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from './mcpServer';

// stdout carries the protocol; the logger writes to stderr only.
const logger = getLogger('mcp:server');

async function start(): Promise<void> {
  try {
  const config = loadConfig();
  const container = new Container({ config });
  const server = createMcpServer(container.tools.tools);

  registerShutdownHandler(async function closeMcpServer() {
    await server.close();
  });
  registerShutdownHandler(async function closeGaClients() {
    await container.dispose();
  });
  setupShutdownHandlers();

  await server.connect(new StdioServerTransport());
  logger.info('MCP server ready', {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools: container.tools.tools.length,
    cacheTtlSeconds: config.cacheTtlSeconds,
    fuzzyThreshold: config.fuzzyThreshold,
  });
  } catch (error) {
  if (error instanceof ConfigurationError) {
    logger.fatal(error.message, error, { hint: error.hint });
  } else {
    logger.fatal('Failed to start server', error instanceof Error ? error : new Error(String(error)));
  }
  process.exit(1);
  }
}

void start();
