/**
 * Base Release Searcher
 * Abstract base class for indexer search providers
 */

import type { Candidate, ReleaseSearcher, ResolvedMedia } from '../types.js';

const HEX_HASH = /^[0-9a-f]{40}$/i;
const MAGNET_HEX = /urn:btih:([0-9a-f]{40})(?![0-9a-z])/i;
const MAGNET_BASE32 = /urn:btih:([a-z2-7]{32})(?![0-9a-z])/i;
const BASE32_ALPHABET = 'abcdefghijklmnopqrstuvwxyz234567';

function base32ToHex(value: string): string {
  let bits = '';
  for (const char of value.toLowerCase()) {
    bits += BASE32_ALPHABET.indexOf(char).toString(2).padStart(5, '0');
  }
  let hex = '';
  for (let i = 0; i + 4 <= bits.length; i += 4) {
    hex += parseInt(bits.slice(i, i + 4), 2).toString(16);
  }
  return hex;
}

export abstract class BaseReleaseSearcher implements ReleaseSearcher {
  abstract readonly name: string;

  abstract search(media: ResolvedMedia): Promise<Candidate[]>;

  /**
   * Build the free-text query for a resolved title
   */
  protected buildQuery(media: ResolvedMedia): string {
    if (media.kind === 'episode') {
      if (media.season !== undefined && media.episode !== undefined) {
        const season = String(media.season).padStart(2, '0');
        const episode = String(media.episode).padStart(2, '0');
        return `${media.title} S${season}E${episode}`;
      }
      return media.title;
    }
    return media.year !== undefined ? `${media.title} ${media.year}` : media.title;
  }

  /**
   * Lowercase 40-hex infohash from an explicit field or a magnet link
   */
  protected extractInfoHash(infoHash: unknown, magnetUrl: unknown): string | null {
    if (typeof infoHash === 'string' && HEX_HASH.test(infoHash)) {
      return infoHash.toLowerCase();
    }
    if (typeof magnetUrl !== 'string') return null;

    const hex = magnetUrl.match(MAGNET_HEX);
    if (hex) return hex[1].toLowerCase();

    const base32 = magnetUrl.match(MAGNET_BASE32);
    if (base32) return base32ToHex(base32[1]);

    return null;
  }
}
