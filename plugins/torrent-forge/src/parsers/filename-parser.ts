/**
 * Release Filename Parser
 * Recovers title, year, season/episode and release tokens from scene-style
 * filenames such as "Movie.Title.2024.2160p.BluRay.x265-GROUP.torrent"
 */

import type { MediaIdentity } from '../types.js';

interface TokenPattern {
  regex: RegExp;
  label: string;
}

export class FilenameParser {
  private static readonly EXTENSION_PATTERN =
    /\.(torrent|nzb|mkv|mp4|m4v|avi|mov|wmv|webm|flv|mpe?g|m2ts|iso)$/i;

  private static readonly SEPARATOR_PATTERN = /[\s._\-()[\]]+/;

  private static readonly QUALITY_PATTERNS: TokenPattern[] = [
    { regex: /\b(4K|2160p|UHD)\b/i, label: '2160p' },
    { regex: /\b1080p\b/i, label: '1080p' },
    { regex: /\b720p\b/i, label: '720p' },
    { regex: /\b480p\b/i, label: '480p' },
    { regex: /\b360p\b/i, label: '360p' },
  ];

  private static readonly SOURCE_PATTERNS: TokenPattern[] = [
    { regex: /\bBlu\s?Ray\b/i, label: 'BluRay' },
    { regex: /\b(BRRip|BDRip)\b/i, label: 'BluRay' },
    { regex: /\bREMUX\b/i, label: 'Remux' },
    { regex: /\bWEB\s?DL\b/i, label: 'WEB-DL' },
    { regex: /\bWEBRip\b/i, label: 'WEBRip' },
    { regex: /\bWEB\b/i, label: 'WEB-DL' },
    { regex: /\bHDTV\b/i, label: 'HDTV' },
    { regex: /\b(DVDRip|DVD)\b/i, label: 'DVD' },
    { regex: /\b(CAM|TS|TC|TELESYNC|HDCAM)\b/i, label: 'CAM' },
  ];

  private static readonly CODEC_PATTERNS: TokenPattern[] = [
    { regex: /\b(x265|H\s?265|HEVC)\b/i, label: 'x265' },
    { regex: /\b(x264|H\s?264|AVC)\b/i, label: 'x264' },
    { regex: /\bXviD\b/i, label: 'XviD' },
    { regex: /\bAV1\b/i, label: 'AV1' },
  ];

  private static readonly AUDIO_PATTERNS: TokenPattern[] = [
    { regex: /\bDTS\s?HD(\s?MA)?\b/i, label: 'DTS-HD' },
    { regex: /\bDTS\b/i, label: 'DTS' },
    { regex: /\bAtmos\b/i, label: 'Atmos' },
    { regex: /\bTrueHD\b/i, label: 'TrueHD' },
    { regex: /\b(DDP|EAC3)\b/i, label: 'EAC3' },
    { regex: /\b(AC3|DD)\b/i, label: 'AC3' },
    { regex: /\bAAC\b/i, label: 'AAC' },
    { regex: /\bFLAC\b/i, label: 'FLAC' },
  ];

  private static readonly DYNAMIC_RANGE_PATTERNS: TokenPattern[] = [
    { regex: /\bHDR(10)?\b/i, label: 'HDR' },
    { regex: /\b(DV|DoVi)\b/i, label: 'DV' },
  ];

  // Tokens that unambiguously start release metadata; bare WEB or DVD can be title words
  private static readonly RELEASE_MARKER =
    /^(4k|uhd|2160p|1080p|720p|480p|360p|bluray|brrip|bdrip|remux|webrip|webdl|hdtv|dvdrip|x264|x265|h264|h265|hevc|xvid)$/i;

  private static readonly YEAR_TOKEN = /^(19\d{2}|20\d{2})$/;
  private static readonly EPISODE_TOKEN = /^S(\d{1,2})E(\d{1,3})$/i;
  private static readonly SEASON_TOKEN = /^S(\d{1,2})$/i;
  private static readonly EPISODE_ONLY_TOKEN = /^E(\d{1,3})$/i;
  private static readonly CROSS_TOKEN = /^(\d{1,2})x(\d{2,3})$/i;
  private static readonly RELEASE_GROUP_PATTERN = /-([A-Za-z0-9]+)$/;

  /**
   * Parse a requested filename. Never throws; a name made only of markers
   * yields an empty title.
   */
  static parse(filename: string): MediaIdentity {
    const source = this.stripExtension(filename);
    const tokens = source.split(this.SEPARATOR_PATTERN).filter(Boolean);

    const episodeMatch = this.findEpisode(tokens);
    const markerIndex = tokens.findIndex((token, index) => index > 0 && this.RELEASE_MARKER.test(token));

    const limit = Math.min(
      episodeMatch?.index ?? tokens.length,
      markerIndex === -1 ? tokens.length : markerIndex
    );
    const yearIndex = this.findYearIndex(tokens, limit);

    const boundary = yearIndex === -1 ? limit : yearIndex;

    let releaseGroup: string | undefined;
    const groupMatch = source.match(this.RELEASE_GROUP_PATTERN);
    if (groupMatch && tokens.length - 1 > boundary) {
      releaseGroup = groupMatch[1];
    }

    let title = tokens.slice(0, boundary).join(' ');
    if (title.length === 0) {
      title = this.fallbackTitle(tokens, releaseGroup !== undefined);
    }

    // A group such as -TS or -DV names the releaser, not the source or range
    const tail = tokens.slice(boundary, releaseGroup ? tokens.length - 1 : tokens.length).join(' ');
    const quality = new Set<string>();
    for (const table of [
      this.QUALITY_PATTERNS,
      this.SOURCE_PATTERNS,
      this.CODEC_PATTERNS,
      this.AUDIO_PATTERNS,
      this.DYNAMIC_RANGE_PATTERNS,
    ]) {
      for (const { regex, label } of table) {
        if (regex.test(tail)) {
          quality.add(label);
        }
      }
    }

    const identity: MediaIdentity = {
      source,
      title,
      year: yearIndex === -1 ? undefined : parseInt(tokens[yearIndex], 10),
      season: episodeMatch?.season,
      episode: episodeMatch?.episode,
      kind: episodeMatch ? 'episode' : 'movie',
      quality,
      releaseGroup,
    };
    return Object.freeze(identity);
  }

  /**
   * Remove a trailing .torrent/.nzb or media container extension
   */
  static stripExtension(filename: string): string {
    return filename.trim().replace(this.EXTENSION_PATTERN, '').trim();
  }

  /**
   * Title for a name that starts with its episode marker: every token that is
   * not an episode marker, a release marker or the trailing group. May be empty.
   */
  private static fallbackTitle(tokens: string[], hasGroup: boolean): string {
    const end = hasGroup ? tokens.length - 1 : tokens.length;
    return tokens
      .slice(0, end)
      .filter((token) => !this.isMarker(token))
      .join(' ');
  }

  private static isMarker(token: string): boolean {
    return [
      this.EPISODE_TOKEN,
      this.CROSS_TOKEN,
      this.SEASON_TOKEN,
      this.EPISODE_ONLY_TOKEN,
      this.RELEASE_MARKER,
    ].some((pattern) => pattern.test(token));
  }

  private static findEpisode(tokens: string[]): { index: number; season: number; episode: number } | null {
    for (let i = 0; i < tokens.length; i++) {
      const combined = tokens[i].match(this.EPISODE_TOKEN) ?? tokens[i].match(this.CROSS_TOKEN);
      if (combined) {
        return { index: i, season: parseInt(combined[1], 10), episode: parseInt(combined[2], 10) };
      }

      // "S01 E01" after separators have been removed
      const season = tokens[i].match(this.SEASON_TOKEN);
      const episode = i + 1 < tokens.length ? tokens[i + 1].match(this.EPISODE_ONLY_TOKEN) : null;
      if (season && episode) {
        return { index: i, season: parseInt(season[1], 10), episode: parseInt(episode[1], 10) };
      }
    }
    return null;
  }

  /**
   * Last year-shaped token before the limit, never the first token
   */
  private static findYearIndex(tokens: string[], limit: number): number {
    for (let i = limit - 1; i >= 1; i--) {
      if (this.YEAR_TOKEN.test(tokens[i])) {
        return i;
      }
    }
    return -1;
  }
}

export function parseFilename(filename: string): MediaIdentity {
  return FilenameParser.parse(filename);
}
