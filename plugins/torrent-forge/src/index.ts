/**
 * Torrent Forge Entry Point
 * Main module exports and server initialization
 */

import { pathToFileURL } from 'url';
import { createLogger } from '@torrent-forge/plugin-utils';
import { loadConfig } from './config.js';
import { createServer } from './server.js';

// Export all modules
export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './bencode/index.js';
export * from './torrent/builder.js';
export * from './torrent/inspect.js';
export * from './parsers/filename-parser.js';
export * from './matching/matcher.js';
export * from './resolvers/index.js';
export * from './search/index.js';
export * from './clients/arr-client.js';
export * from './state-machine.js';
export * from './pipeline.js';
export * from './services.js';
export * from './nzb.js';
export * from './server.js';

/**
 * Start the HTTP server with configuration from the environment
 */
export async function startServer(): Promise<void> {
  const logger = createLogger('torrent-forge');

  try {
    const config = loadConfig();
    logger.setLevel(config.logLevel);
    logger.info('Starting Torrent Forge', { version: '1.0.0', mode: config.mode });

    const server = await createServer(config);
    await server.start();

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully`);
      server.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        }
      );
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start Torrent Forge', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

// Start server if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void startServer();
}
