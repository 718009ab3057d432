/**
 * Base metadata resolver for *arr lookup endpoints
 */

import { createLogger, type Logger } from '@torrent-forge/plugin-utils';
import { ArrClient, type ArrClientOptions } from '../clients/arr-client.js';
import { ResolverUnavailableError } from '../errors.js';
import type { MediaIdentity, MetadataResolver, ResolvedMedia } from '../types.js';

export type ResolverOptions = Omit<ArrClientOptions, 'service'>;

/** Subset of a Radarr/Sonarr lookup entry that resolution reads */
export interface LookupEntry {
  title: string;
  year?: number;
  imdbId?: string;
  tmdbId?: number;
  tvdbId?: number;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function toLookupEntry(value: unknown): LookupEntry | null {
  if (typeof value !== 'object' || value === null) return null;
  const title: unknown = Reflect.get(value, 'title');
  if (typeof title !== 'string' || title.length === 0) return null;
  return {
    title,
    year: optionalNumber(Reflect.get(value, 'year')),
    imdbId: optionalString(Reflect.get(value, 'imdbId')),
    tmdbId: optionalNumber(Reflect.get(value, 'tmdbId')),
    tvdbId: optionalNumber(Reflect.get(value, 'tvdbId')),
  };
}

export abstract class BaseLookupResolver implements MetadataResolver {
  abstract readonly name: string;
  protected readonly client: ArrClient;
  protected readonly logger: Logger;

  constructor(service: string, options: ResolverOptions) {
    this.logger = options.logger ?? createLogger(`torrent-forge:${service.toLowerCase()}`);
    this.client = new ArrClient({ ...options, service, logger: this.logger });
  }

  abstract resolve(identity: MediaIdentity): Promise<ResolvedMedia | null>;

  /**
   * Run a lookup and pick the entry whose year matches, else the first one
   * @throws ResolverUnavailableError
   */
  protected async lookup(path: string, term: string, year?: number): Promise<LookupEntry | null> {
    let data: unknown;
    try {
      data = await this.client.get(path, { term });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ResolverUnavailableError(this.name, message, { cause: error });
    }

    if (!Array.isArray(data)) {
      throw new ResolverUnavailableError(this.name, 'lookup did not return a list');
    }

    const entries: LookupEntry[] = [];
    for (const item of data) {
      const entry = toLookupEntry(item);
      if (entry) entries.push(entry);
    }

    if (entries.length === 0) {
      this.logger.debug('Lookup returned no entries', { term });
      return null;
    }

    const sameYear = year !== undefined ? entries.find(entry => entry.year === year) : undefined;
    return sameYear ?? entries[0];
  }
}
