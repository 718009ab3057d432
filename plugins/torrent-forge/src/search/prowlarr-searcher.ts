/**
 * Prowlarr Searcher
 * Aggregated indexer search through Prowlarr's /api/v1/search
 */

import { createLogger, type Logger } from '@torrent-forge/plugin-utils';
import { BaseReleaseSearcher } from './base-searcher.js';
import { ArrClient, type ArrClientOptions } from '../clients/arr-client.js';
import { SearcherUnavailableError } from '../errors.js';
import type { Candidate, ResolvedMedia } from '../types.js';

export type ProwlarrSearcherOptions = Omit<ArrClientOptions, 'service'>;

/** Newznab category roots */
const CATEGORIES = {
  movie: 2000,
  episode: 5000,
} as const;

const SEARCH_TYPES = {
  movie: 'movie',
  episode: 'tvsearch',
} as const;

export class ProwlarrSearcher extends BaseReleaseSearcher {
  readonly name = 'Prowlarr';
  private readonly client: ArrClient;
  private readonly logger: Logger;

  constructor(options: ProwlarrSearcherOptions) {
    super();
    this.logger = options.logger ?? createLogger('torrent-forge:prowlarr');
    this.client = new ArrClient({ ...options, service: this.name, logger: this.logger });
  }

  /**
   * Candidates in indexer order; entries without a usable infohash are dropped
   * @throws SearcherUnavailableError
   */
  async search(media: ResolvedMedia): Promise<Candidate[]> {
    const query = this.buildQuery(media);
    let data: unknown;
    try {
      data = await this.client.get('/api/v1/search', {
        query,
        type: SEARCH_TYPES[media.kind],
        categories: CATEGORIES[media.kind],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SearcherUnavailableError(this.name, message, { cause: error });
    }

    if (!Array.isArray(data)) {
      throw new SearcherUnavailableError(this.name, 'search did not return a list');
    }

    const candidates: Candidate[] = [];
    for (const item of data) {
      const candidate = this.toCandidate(item);
      if (candidate) candidates.push(candidate);
    }

    this.logger.info(`Found ${candidates.length} candidates`, { query, received: data.length });
    return candidates;
  }

  private toCandidate(item: unknown): Candidate | null {
    if (typeof item !== 'object' || item === null) return null;

    const title: unknown = Reflect.get(item, 'title');
    if (typeof title !== 'string' || title.length === 0) return null;

    const infoHash = this.extractInfoHash(Reflect.get(item, 'infoHash'), Reflect.get(item, 'magnetUrl'));
    if (!infoHash) return null;

    const size: unknown = Reflect.get(item, 'size');
    const seeders: unknown = Reflect.get(item, 'seeders');
    const indexer: unknown = Reflect.get(item, 'indexer');
    const guid: unknown = Reflect.get(item, 'guid');

    return {
      name: title,
      infoHash,
      sizeBytes: typeof size === 'number' && Number.isSafeInteger(size) && size > 0 ? size : 0,
      seeders: typeof seeders === 'number' ? seeders : undefined,
      indexer: typeof indexer === 'string' ? indexer : undefined,
      guid: typeof guid === 'string' ? guid : undefined,
    };
  }
}
