/**
 * Sonarr series lookup
 */

import { BaseLookupResolver, type ResolverOptions } from './base.js';
import type { MediaIdentity, ResolvedMedia } from '../types.js';

export class SonarrResolver extends BaseLookupResolver {
  readonly name = 'Sonarr';

  constructor(options: ResolverOptions) {
    super('Sonarr', options);
  }

  async resolve(identity: MediaIdentity): Promise<ResolvedMedia | null> {
    const entry = await this.lookup('/api/v3/series/lookup', identity.title, identity.year);
    if (!entry) return null;

    // Season and episode come from the filename, the lookup only knows the series
    return {
      kind: 'episode',
      title: entry.title,
      year: entry.year ?? identity.year,
      season: identity.season,
      episode: identity.episode,
      imdbId: entry.imdbId,
      tvdbId: entry.tvdbId,
    };
  }
}
