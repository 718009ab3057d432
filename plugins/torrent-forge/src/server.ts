/**
 * Torrent Forge Server
 * HTTP server answering GET /{name}.torrent and GET /{name}.nzb
 */

import Fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { createLogger, type ServiceStatus } from '@torrent-forge/plugin-utils';
import { createPipeline, type PipelineDeps } from './services.js';
import { buildPlaceholderNzb, NZB_CONTENT_TYPE } from './nzb.js';
import type { RequestPipeline } from './pipeline.js';
import type { Config } from './config.js';

const PLUGIN_NAME = 'torrent-forge';
const VERSION = '1.0.0';

export const TORRENT_CONTENT_TYPE = 'application/x-bittorrent';

export interface ServerDeps extends PipelineDeps {
  pipeline?: RequestPipeline;
}

/**
 * Content-Disposition for a download name. Names outside printable ASCII get
 * an RFC 5987 `filename*` next to an ASCII fallback.
 */
export function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  if (fallback === fileName) {
    return `attachment; filename="${fileName}"`;
  }
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

export async function createServer(config: Config, deps: ServerDeps = {}) {
  const logger = deps.logger ?? createLogger(`${PLUGIN_NAME}:server`, config.logLevel);
  const pipeline = deps.pipeline ?? createPipeline(config, deps);
  const now = deps.now ?? (() => new Date());

  const app = Fastify({
    logger: false,
    // Release names routinely exceed the default of 100
    maxParamLength: 1024,
  });

  await app.register(cors, {
    origin: true,
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error('Unhandled request error', { url: request.url, error: error.message });
    }
    return reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal Server Error' : error.name,
      message: error.message,
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ error: 'Not Found', message: `No route for ${request.url}` });
  });

  // =========================================================================
  // Health Check Endpoints
  // =========================================================================

  app.get('/health', async () => {
    return { status: 'ok', plugin: PLUGIN_NAME, mode: config.mode, timestamp: now().toISOString() };
  });

  app.get('/v1/status', async () => {
    const status: ServiceStatus = {
      name: PLUGIN_NAME,
      version: VERSION,
      running: true,
      mode: config.mode,
    };
    return status;
  });

  // =========================================================================
  // Downloads
  // =========================================================================

  app.get<{ Params: { file: string } }>('/:file', async (request, reply) => {
    const { file } = request.params;
    const dot = file.lastIndexOf('.');
    const extension = dot === -1 ? '' : file.slice(dot + 1).toLowerCase();
    logger.info(`New request: ${file}`);

    if (extension === 'nzb') {
      const name = file.slice(0, dot).trim();
      if (name.length === 0) {
        return reply.status(404).send({ error: 'Not Found', message: 'Empty filename' });
      }
      const nzb = buildPlaceholderNzb(name, now());
      return reply
        .status(200)
        .header('Content-Type', NZB_CONTENT_TYPE)
        .header('Content-Disposition', contentDisposition(nzb.fileName))
        .send(nzb.body);
    }

    if (extension !== 'torrent') {
      logger.warn(`Invalid file type: ${extension || '(none)'}`);
      return reply.status(400).send({ error: 'Bad Request', message: 'Unsupported file type' });
    }

    const outcome = await pipeline.run(file);

    switch (outcome.status) {
      case 'ok':
        return reply
          .status(200)
          .header('Content-Type', TORRENT_CONTENT_TYPE)
          .header('Content-Disposition', contentDisposition(outcome.torrent.fileName))
          .header('X-Infohash', outcome.torrent.infoHash)
          .send(outcome.torrent.bytes);
      case 'not_found':
        return reply.status(404).send({ error: 'Not Found', message: outcome.reason });
      case 'error':
        return reply.status(500).send({ error: 'Internal Server Error', message: outcome.reason });
    }
  });

  // =========================================================================
  // Server Lifecycle
  // =========================================================================

  const start = async () => {
    await app.listen({
      port: config.port,
      host: config.host,
    });
    logger.info(`Torrent forge server running on ${config.host}:${config.port}`, { mode: config.mode });
  };

  const stop = async () => {
    logger.info('Shutting down server...');
    await app.close();
    logger.info('Server stopped');
  };

  return {
    app,
    start,
    stop,
  };
}
