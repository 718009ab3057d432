/**
 * Release Matcher
 * Scores candidate release names against the requested filename
 */

import { createLogger, type Logger } from '@torrent-forge/plugin-utils';
import type { Candidate, MatchResult, MediaIdentity } from '../types.js';

/**
 * Lowercase and turn scene separators into single spaces
 */
export function normalizeReleaseName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[._-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Insert/delete edit distance (a substitution costs one delete plus one insert)
 */
export function indelDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 2);
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Similarity in [0, 1]: 1 - distance / (|a| + |b|). Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return 1 - indelDistance(a, b) / total;
}

export class ReleaseMatcher {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('torrent-forge:matcher');
  }

  /**
   * Pick the highest-scoring candidate at or above the threshold.
   * Ties keep the earlier candidate. Returns null when nothing qualifies.
   */
  bestMatch(identity: MediaIdentity, candidates: Candidate[], threshold: number): MatchResult | null {
    if (candidates.length === 0) {
      this.logger.warn('No candidates to match', { source: identity.source });
      return null;
    }

    const requested = normalizeReleaseName(identity.source);
    let best: MatchResult | null = null;

    for (const candidate of candidates) {
      const score = similarityRatio(requested, normalizeReleaseName(candidate.name));
      this.logger.debug('Scored candidate', { name: candidate.name, score: Number(score.toFixed(4)) });

      if (best === null || score > best.score) {
        best = { candidate, score };
      }
    }

    if (best === null || best.score < threshold) {
      this.logger.info(`No candidate reached threshold ${threshold}`, {
        source: identity.source,
        bestScore: best ? Number(best.score.toFixed(4)) : null,
        candidates: candidates.length,
      });
      return null;
    }

    this.logger.info(`Best match: ${best.candidate.name} (score: ${best.score.toFixed(2)})`);
    return best;
  }
}
