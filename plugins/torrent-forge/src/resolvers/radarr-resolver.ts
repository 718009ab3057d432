/**
 * Radarr movie lookup
 */

import { BaseLookupResolver, type ResolverOptions } from './base.js';
import type { MediaIdentity, ResolvedMedia } from '../types.js';

export class RadarrResolver extends BaseLookupResolver {
  readonly name = 'Radarr';

  constructor(options: ResolverOptions) {
    super('Radarr', options);
  }

  async resolve(identity: MediaIdentity): Promise<ResolvedMedia | null> {
    const term = identity.year !== undefined ? `${identity.title} ${identity.year}` : identity.title;
    const entry = await this.lookup('/api/v3/movie/lookup', term, identity.year);
    if (!entry) return null;

    return {
      kind: 'movie',
      title: entry.title,
      year: entry.year ?? identity.year,
      imdbId: entry.imdbId,
      tmdbId: entry.tmdbId,
    };
  }
}
