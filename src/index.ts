#!/usr/bin/env node

/**
 * Chat Relay - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { InvalidConfigError } from './core/errors.js';
import { RelayApp } from './presentation/RelayApp.js';
import { logger } from './utils/logger.js';

async function main() {
  let app: RelayApp | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    app = new RelayApp(config);
    await app.start();

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);

      let exitCode = 0;
      try {
        if (app) {
          await app.shutdown();
        }
      } catch (error) {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        exitCode = 1;
      }
      process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception', { error: error.message, stack: error.stack });
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled rejection', { reason: String(reason) });
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      console.error(`\n❌ ${error.message}\n`);
      console.error('💡 Check your .env file and CLI arguments');
    } else {
      logger.error('Fatal error in main()', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (app) {
      await app.shutdown().catch((shutdownError: unknown) => {
        logger.error('Cleanup after fatal error failed', { error: String(shutdownError) });
      });
    }
    process.exit(1);
  }
}

void main();
