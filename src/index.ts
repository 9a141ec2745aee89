#!/usr/bin/env node

/**
 * Cultural Navigator - entry point
 *
 * Everything is logged to stderr; stdout belongs to the MCP stdio transport.
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('main');

async function main() {
  let server: McpServer | null = null;
  let shuttingDown = false;

  const shutdown = async (signal: string, exitCode: number) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`📛 Received ${signal}, shutting down...`);
    try {
      await server?.shutdown();
    } catch (error) {
      logger.error('Error during shutdown', error);
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  try {
    const config = getConfig();
    printConfigInfo(config);

    server = new McpServer(config);
    await server.start();
    server.printStats();

    process.on('SIGINT', () => void shutdown('SIGINT', 0));
    process.on('SIGTERM', () => void shutdown('SIGTERM', 0));

    process.on('uncaughtException', (error) => {
      logger.error('💥 Uncaught Exception', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('💥 Unhandled Rejection', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    logger.error('💥 Fatal error in main()', error);
    await server?.shutdown().catch((shutdownError: unknown) => logger.error('Error during shutdown', shutdownError));
    process.exit(1);
  }
}

void main();
