/**
 * Torrent Forge Types
 */

import type { LogLevel } from '@torrent-forge/plugin-utils';

// ============================================================================
// Configuration
// ============================================================================

export type ForgeMode = 'fixed' | 'search';

/** How fixed-hash mode satisfies the target infohash */
export type FixedHashPolicy = 'assert' | 'bruteforce';

export interface ServiceEndpoint {
  url: string;
  apiKey: string;
}

export interface TorrentDefaults {
  announceList: string[];
  pieceLength: number;
  fakeFileSize: number;
  createdBy: string;
  comment: string;
  isPrivate: boolean;
}

export interface TorrentForgeConfig {
  mode: ForgeMode;
  infoHash: string;
  fixedHashPolicy: FixedHashPolicy;
  fixedHashMaxAttempts: number;
  matchThreshold: number;

  radarr?: ServiceEndpoint;
  sonarr?: ServiceEndpoint;
  prowlarr?: ServiceEndpoint;
  httpTimeoutMs: number;
  httpMaxRetries: number;

  torrent: TorrentDefaults;

  port: number;
  host: string;
  rateLimitMax: number;
  rateLimitWindowMs: number;

  logLevel: LogLevel;
}

// ============================================================================
// Media identity
// ============================================================================

export type MediaKind = 'movie' | 'episode';

export interface MediaIdentity {
  /** Requested filename without its extension */
  readonly source: string;
  readonly title: string;
  readonly year?: number;
  readonly season?: number;
  readonly episode?: number;
  readonly kind: MediaKind;
  /** Normalized release tokens such as 2160p, BluRay, x265 */
  readonly quality: ReadonlySet<string>;
  readonly releaseGroup?: string;
}

export interface ResolvedMedia {
  kind: MediaKind;
  title: string;
  year?: number;
  season?: number;
  episode?: number;
  imdbId?: string;
  tmdbId?: number;
  tvdbId?: number;
}

// ============================================================================
// Search and matching
// ============================================================================

export interface Candidate {
  name: string;
  /** 40-character lowercase hex */
  infoHash: string;
  sizeBytes: number;
  seeders?: number;
  indexer?: string;
  guid?: string;
}

export interface MatchResult {
  candidate: Candidate;
  score: number;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface MetadataResolver {
  resolve(identity: MediaIdentity): Promise<ResolvedMedia | null>;
}

export interface ReleaseSearcher {
  search(media: ResolvedMedia): Promise<Candidate[]>;
}

// ============================================================================
// Torrent output
// ============================================================================

export interface TorrentSpec {
  name: string;
  announceList: string[];
  pieceLength: number;
  /** Concatenated 20-byte SHA-1 digests */
  pieces: Buffer;
  length: number;
  infoHashOverride?: string;
  comment?: string;
  createdBy?: string;
  /** Unix seconds */
  creationDate?: number;
  isPrivate: boolean;
  /** Extra integer mixed into the info mapping while searching for a target hash */
  nonce?: number;
}

export interface BuiltTorrent {
  /** Download filename, always ending in .torrent */
  fileName: string;
  bytes: Buffer;
  /** Infohash carried by the response metadata */
  infoHash: string;
  /** SHA-1 of the encoded info mapping */
  computedInfoHash: string;
  spec: TorrentSpec;
}

// ============================================================================
// Pipeline
// ============================================================================

export type PipelineState =
  | 'received'
  | 'parsed'
  | 'resolved'
  | 'searched'
  | 'matched'
  | 'no_match'
  | 'built'
  | 'failed'
  | 'responded';

export type PipelineOutcome =
  | {
      status: 'ok';
      torrent: BuiltTorrent;
      identity: MediaIdentity;
      match?: MatchResult;
      history: PipelineState[];
    }
  | {
      status: 'not_found';
      reason: string;
      history: PipelineState[];
    }
  | {
      status: 'error';
      reason: string;
      error: Error;
      history: PipelineState[];
    };
