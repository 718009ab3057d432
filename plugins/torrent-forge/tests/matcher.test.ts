/**
 * Release matcher
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Logger } from '@torrent-forge/plugin-utils';
import {
  ReleaseMatcher,
  indelDistance,
  normalizeReleaseName,
  similarityRatio,
} from '../src/matching/matcher.js';
import { parseFilename } from '../src/parsers/filename-parser.js';
import type { Candidate } from '../src/types.js';

const quiet = new Logger('test', 'error');

function candidate(name: string, hashDigit: string): Candidate {
  return { name, infoHash: hashDigit.repeat(40), sizeBytes: 1024 };
}

describe('normalizeReleaseName', () => {
  it('lowercases and collapses separators', () => {
    assert.equal(normalizeReleaseName('  Movie.Title_2024-2160p  '), 'movie title 2024 2160p');
    assert.equal(normalizeReleaseName('A..B  C'), 'a b c');
  });
});

describe('indelDistance', () => {
  it('counts inserts and deletes, substitutions as two', () => {
    assert.equal(indelDistance('', ''), 0);
    assert.equal(indelDistance('', 'abc'), 3);
    assert.equal(indelDistance('abc', 'abc'), 0);
    assert.equal(indelDistance('abc', 'abd'), 2);
    assert.equal(indelDistance('abc', 'abcd'), 1);
  });
});

describe('similarityRatio', () => {
  it('is 1 for identical strings, including two empty ones', () => {
    assert.equal(similarityRatio('', ''), 1);
    assert.equal(similarityRatio('same', 'same'), 1);
  });

  it('is 0 for strings sharing nothing', () => {
    assert.equal(similarityRatio('abc', 'xyz'), 0);
  });

  it('scores an added quality suffix', () => {
    const score = similarityRatio('movie title 2024', 'movie title 2024 2160p');
    assert.ok(Math.abs(score - 32 / 38) < 1e-12);
  });
});

describe('ReleaseMatcher.bestMatch', () => {
  const matcher = new ReleaseMatcher(quiet);
  const identity = parseFilename('Movie.Title.2024.torrent');

  it('accepts a candidate above the threshold', () => {
    const match = matcher.bestMatch(identity, [candidate('Movie.Title.2024.2160p', 'a')], 0.8);
    assert.ok(match);
    assert.equal(match.candidate.infoHash, 'a'.repeat(40));
    assert.ok(Math.abs(match.score - 32 / 38) < 1e-12);
  });

  it('rejects the same candidate under a stricter threshold', () => {
    assert.equal(matcher.bestMatch(identity, [candidate('Movie.Title.2024.2160p', 'a')], 0.99), null);
  });

  it('picks the highest score', () => {
    const match = matcher.bestMatch(
      identity,
      [candidate('Other.Film.1999', 'a'), candidate('Movie.Title.2024', 'b'), candidate('Movie.Title.2024.720p', 'c')],
      0.5
    );
    assert.equal(match?.candidate.infoHash, 'b'.repeat(40));
    assert.equal(match?.score, 1);
  });

  it('keeps the earliest candidate on a tie', () => {
    const match = matcher.bestMatch(
      identity,
      [candidate('Movie.Title.2024.1080p', 'a'), candidate('Movie.Title.2024.1080p', 'b')],
      0.5
    );
    assert.equal(match?.candidate.infoHash, 'a'.repeat(40));
  });

  it('accepts a score equal to the threshold', () => {
    const match = matcher.bestMatch(identity, [candidate('movie title 2024', 'a')], 1);
    assert.equal(match?.score, 1);
  });

  it('returns null without candidates', () => {
    assert.equal(matcher.bestMatch(identity, [], 0), null);
  });
});
