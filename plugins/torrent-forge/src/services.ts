/**
 * Wiring from configuration to a ready pipeline
 */

import type { AxiosAdapter } from 'axios';
import { createLogger, type Logger } from '@torrent-forge/plugin-utils';
import { RequestPipeline } from './pipeline.js';
import { MediaManagerResolver, RadarrResolver, SonarrResolver } from './resolvers/index.js';
import { ProwlarrSearcher } from './search/index.js';
import { TorrentBuilder } from './torrent/builder.js';
import type { Config } from './config.js';
import type { MetadataResolver, ReleaseSearcher } from './types.js';

export interface PipelineDeps {
  resolver?: MetadataResolver;
  searcher?: ReleaseSearcher;
  /** Transport for the *arr clients */
  adapter?: AxiosAdapter;
  now?: () => Date;
  logger?: Logger;
}

export function createPipeline(config: Config, deps: PipelineDeps = {}): RequestPipeline {
  const logger = deps.logger ?? createLogger('torrent-forge', config.logLevel);
  const http = {
    timeoutMs: config.httpTimeoutMs,
    maxRetries: config.httpMaxRetries,
    adapter: deps.adapter,
  };

  const builder = new TorrentBuilder({
    defaults: config.torrent,
    fixedHashPolicy: config.fixedHashPolicy,
    fixedHashMaxAttempts: config.fixedHashMaxAttempts,
    now: deps.now,
    logger: logger.child('builder'),
  });

  if (config.mode === 'fixed') {
    return new RequestPipeline({
      mode: 'fixed',
      infoHash: config.infoHash,
      matchThreshold: config.matchThreshold,
      builder,
      logger: logger.child('pipeline'),
    });
  }

  const resolver =
    deps.resolver ??
    new MediaManagerResolver({
      movie: config.radarr ? new RadarrResolver({ ...http, endpoint: config.radarr, logger: logger.child('radarr') }) : undefined,
      episode: config.sonarr ? new SonarrResolver({ ...http, endpoint: config.sonarr, logger: logger.child('sonarr') }) : undefined,
    });

  let searcher = deps.searcher;
  if (!searcher && config.prowlarr) {
    searcher = new ProwlarrSearcher({ ...http, endpoint: config.prowlarr, logger: logger.child('prowlarr') });
  }

  return new RequestPipeline({
    mode: 'search',
    infoHash: config.infoHash,
    matchThreshold: config.matchThreshold,
    builder,
    resolver,
    searcher,
    logger: logger.child('pipeline'),
  });
}
