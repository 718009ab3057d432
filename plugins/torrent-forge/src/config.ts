/**
 * Torrent Forge Configuration
 */

import 'dotenv/config';
import {
  isLogLevel,
  isPowerOfTwo,
  parseBoolean,
  parseCsvList,
  validateEnum,
  validateHttpUrl,
  validatePort,
  validatePositiveInt,
  validateRange,
} from '@torrent-forge/plugin-utils';
import { ConfigError } from './errors.js';
import { INFO_HASH_PATTERN } from './torrent/builder.js';
import type { FixedHashPolicy, ForgeMode, ServiceEndpoint, TorrentForgeConfig } from './types.js';

export type Config = TorrentForgeConfig;

export const DEFAULT_INFOHASH = '41e6cd50ccec55cd5704c5e3d176e7b59317a3fb';
export const DEFAULT_ANNOUNCE_URL = 'udp://tracker.opentrackr.org:1337/announce';
export const DEFAULT_PIECE_LENGTH = 262144;
export const DEFAULT_FAKE_FILE_SIZE = 1073741824;

const MODES: readonly ForgeMode[] = ['fixed', 'search'];
const POLICIES: readonly FixedHashPolicy[] = ['assert', 'bruteforce'];
const MIN_PIECE_LENGTH = 16 * 1024;

function readEndpoint(env: NodeJS.ProcessEnv, prefix: string, problems: string[]): ServiceEndpoint | undefined {
  const url = env[`${prefix}_URL`];
  const apiKey = env[`${prefix}_API_KEY`];
  if (!url && !apiKey) {
    return undefined;
  }
  if (!url || !apiKey) {
    problems.push(`${prefix}_URL and ${prefix}_API_KEY must be set together`);
    return undefined;
  }
  return { url, apiKey };
}

function checkEndpoint(name: string, endpoint: ServiceEndpoint | undefined, problems: string[]): void {
  if (!endpoint) return;
  if (!validateHttpUrl(endpoint.url)) {
    problems.push(`${name}_URL must be an http(s) URL`);
  }
  if (endpoint.apiKey.trim().length === 0) {
    problems.push(`${name}_API_KEY must not be empty`);
  }
}

/**
 * Every problem with a configuration, empty when it is usable
 */
export function validateConfig(config: Config): string[] {
  const problems: string[] = [];

  if (!MODES.includes(config.mode)) {
    problems.push(`TORRENT_FORGE_MODE must be one of ${MODES.join(', ')}`);
  }

  if (config.mode === 'fixed') {
    if (!INFO_HASH_PATTERN.test(config.infoHash)) {
      problems.push('INFOHASH must be 40 hexadecimal characters');
    }
    if (!POLICIES.includes(config.fixedHashPolicy)) {
      problems.push(`FIXED_HASH_POLICY must be one of ${POLICIES.join(', ')}`);
    }
    if (!validatePositiveInt(config.fixedHashMaxAttempts)) {
      problems.push('FIXED_HASH_MAX_ATTEMPTS must be a positive integer');
    }
  }

  if (config.mode === 'search') {
    if (!config.prowlarr) {
      problems.push('PROWLARR_URL and PROWLARR_API_KEY are required in search mode');
    }
    if (!config.radarr && !config.sonarr) {
      problems.push('search mode needs RADARR_URL/RADARR_API_KEY or SONARR_URL/SONARR_API_KEY');
    }
  }
  checkEndpoint('RADARR', config.radarr, problems);
  checkEndpoint('SONARR', config.sonarr, problems);
  checkEndpoint('PROWLARR', config.prowlarr, problems);

  if (!validateRange(config.matchThreshold, 0, 1)) {
    problems.push('MATCH_THRESHOLD must be a number between 0 and 1');
  }
  if (!validatePositiveInt(config.httpTimeoutMs)) {
    problems.push('HTTP_TIMEOUT_MS must be a positive integer');
  }
  if (!Number.isSafeInteger(config.httpMaxRetries) || config.httpMaxRetries < 0) {
    problems.push('HTTP_MAX_RETRIES must be a non-negative integer');
  }

  if (config.torrent.announceList.length === 0) {
    problems.push('ANNOUNCE_URLS must name at least one tracker');
  }
  if (!isPowerOfTwo(config.torrent.pieceLength) || config.torrent.pieceLength < MIN_PIECE_LENGTH) {
    problems.push(`PIECE_LENGTH must be a power of two of at least ${MIN_PIECE_LENGTH}`);
  }
  if (!validatePositiveInt(config.torrent.fakeFileSize)) {
    problems.push('FAKE_FILE_SIZE must be a positive integer');
  }

  if (!validatePort(config.port)) {
    problems.push('TORRENT_FORGE_PORT must be between 1 and 65535');
  }
  if (config.host.trim().length === 0) {
    problems.push('TORRENT_FORGE_HOST must not be empty');
  }
  if (!validatePositiveInt(config.rateLimitMax)) {
    problems.push('RATE_LIMIT_MAX must be a positive integer');
  }
  if (!validatePositiveInt(config.rateLimitWindowMs)) {
    problems.push('RATE_LIMIT_WINDOW_MS must be a positive integer');
  }
  if (!isLogLevel(config.logLevel)) {
    problems.push('LOG_LEVEL must be one of debug, info, warn, error');
  }

  return problems;
}

/**
 * Read the environment into a frozen configuration
 * @throws ConfigError listing every problem found
 */
export function loadConfig(overrides?: Partial<Config>, env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const problems: string[] = [];

  const mode = validateEnum(env.TORRENT_FORGE_MODE?.toLowerCase(), MODES, 'fixed');
  if (!mode) {
    problems.push(`TORRENT_FORGE_MODE must be one of ${MODES.join(', ')}`);
  }
  const fixedHashPolicy = validateEnum(env.FIXED_HASH_POLICY?.toLowerCase(), POLICIES, 'assert');
  if (!fixedHashPolicy) {
    problems.push(`FIXED_HASH_POLICY must be one of ${POLICIES.join(', ')}`);
  }
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    problems.push('LOG_LEVEL must be one of debug, info, warn, error');
  }

  const announceList = parseCsvList(env.ANNOUNCE_URLS);

  const config: Config = {
    mode: mode ?? 'fixed',
    infoHash: (env.INFOHASH ?? DEFAULT_INFOHASH).trim().toLowerCase(),
    fixedHashPolicy: fixedHashPolicy ?? 'assert',
    fixedHashMaxAttempts: parseInt(env.FIXED_HASH_MAX_ATTEMPTS ?? '1000', 10),
    matchThreshold: parseFloat(env.MATCH_THRESHOLD ?? '0.8'),

    radarr: readEndpoint(env, 'RADARR', problems),
    sonarr: readEndpoint(env, 'SONARR', problems),
    prowlarr: readEndpoint(env, 'PROWLARR', problems),
    httpTimeoutMs: parseInt(env.HTTP_TIMEOUT_MS ?? '10000', 10),
    httpMaxRetries: parseInt(env.HTTP_MAX_RETRIES ?? '2', 10),

    torrent: {
      announceList: announceList.length > 0 ? announceList : [DEFAULT_ANNOUNCE_URL],
      pieceLength: parseInt(env.PIECE_LENGTH ?? String(DEFAULT_PIECE_LENGTH), 10),
      fakeFileSize: parseInt(env.FAKE_FILE_SIZE ?? String(DEFAULT_FAKE_FILE_SIZE), 10),
      createdBy: 'torrent-forge',
      comment: 'Created by torrent-forge',
      isPrivate: parseBoolean(env.TORRENT_PRIVATE, true),
    },

    // Server
    port: parseInt(env.TORRENT_FORGE_PORT ?? env.PORT ?? '8000', 10),
    host: env.TORRENT_FORGE_HOST ?? env.HOST ?? '0.0.0.0',
    rateLimitMax: parseInt(env.RATE_LIMIT_MAX ?? '100', 10),
    rateLimitWindowMs: parseInt(env.RATE_LIMIT_WINDOW_MS ?? '60000', 10),

    // Logging
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',

    // Apply overrides
    ...overrides,
  };

  for (const problem of validateConfig(config)) {
    if (!problems.includes(problem)) {
      problems.push(problem);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return Object.freeze(config);
}
