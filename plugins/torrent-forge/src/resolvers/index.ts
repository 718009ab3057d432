/**
 * Metadata resolvers
 */

import type { MediaIdentity, MetadataResolver, ResolvedMedia } from '../types.js';

export { BaseLookupResolver, toLookupEntry } from './base.js';
export type { LookupEntry, ResolverOptions } from './base.js';
export { RadarrResolver } from './radarr-resolver.js';
export { SonarrResolver } from './sonarr-resolver.js';

/**
 * Dispatches to the movie or series resolver by parsed kind. A kind without
 * a configured resolver resolves to null.
 */
export class MediaManagerResolver implements MetadataResolver {
  constructor(
    private readonly resolvers: { movie?: MetadataResolver; episode?: MetadataResolver }
  ) {}

  async resolve(identity: MediaIdentity): Promise<ResolvedMedia | null> {
    const resolver = this.resolvers[identity.kind];
    if (!resolver) return null;
    return resolver.resolve(identity);
  }
}
