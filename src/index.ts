#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, setConfig } from './config.js';
import { createServer } from './server.js';
import { logger, setLogLevel } from './utils/logger.js';
import { VERSION } from './version.js';

async function runServer() {
  try {
    const config = loadConfig();
    setConfig(config);
    setLogLevel(config.logLevel);
    logger.debug(`Configuration loaded (logLevel=${config.logLevel}, defaultHeaderStyle=${config.defaultHeaderStyle})`);

    const transport = new StdioServerTransport();
    const server = createServer();

    // Handle uncaught exceptions
    process.on('uncaughtException', (error) => {
      logger.error(`Uncaught exception: ${error.message}`);
      process.exit(1);
    });

    // Handle unhandled rejections
    process.on('unhandledRejection', (reason) => {
      const errorMessage = reason instanceof Error ? reason.message : String(reason);
      logger.error(`Unhandled rejection: ${errorMessage}`);
      process.exit(1);
    });

    logger.info(`Starting docx-text-tools ${VERSION}`);
    await server.connect(transport);
    logger.info('Server connected successfully');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to start server: ${errorMessage}`);
    if (error instanceof Error && error.stack) logger.debug(error.stack);
    process.exit(1);
  }
}

runServer().catch((error: unknown) => {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(`Fatal error running server: ${errorMessage}`);
  process.exit(1);
});
