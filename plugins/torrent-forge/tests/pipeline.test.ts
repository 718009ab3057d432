/**
 * Request pipeline with in-process collaborators
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Logger } from '@torrent-forge/plugin-utils';
import { RequestPipeline, identityToMedia } from '../src/pipeline.js';
import { TorrentBuilder } from '../src/torrent/builder.js';
import {
  ConfigError,
  HashMismatchError,
  ResolverUnavailableError,
  SearcherUnavailableError,
} from '../src/errors.js';
import { parseFilename } from '../src/parsers/filename-parser.js';
import type {
  Candidate,
  FixedHashPolicy,
  MediaIdentity,
  MetadataResolver,
  ReleaseSearcher,
  ResolvedMedia,
} from '../src/types.js';

const TARGET = '41e6cd50ccec55cd5704c5e3d176e7b59317a3fb';
const quiet = new Logger('test', 'error');

class FakeResolver implements MetadataResolver {
  readonly calls: MediaIdentity[] = [];

  constructor(private readonly result: ResolvedMedia | null | Error) {}

  async resolve(identity: MediaIdentity): Promise<ResolvedMedia | null> {
    this.calls.push(identity);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class FakeSearcher implements ReleaseSearcher {
  readonly calls: ResolvedMedia[] = [];

  constructor(private readonly result: Candidate[] | Error) {}

  async search(media: ResolvedMedia): Promise<Candidate[]> {
    this.calls.push(media);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

function makeBuilder(policy: FixedHashPolicy = 'assert', maxAttempts = 10): TorrentBuilder {
  return new TorrentBuilder({
    defaults: {
      announceList: ['udp://tracker.test:1337/announce'],
      pieceLength: 16384,
      fakeFileSize: 65536,
      createdBy: 'torrent-forge',
      comment: 'Created by torrent-forge',
      isPrivate: true,
    },
    fixedHashPolicy: policy,
    fixedHashMaxAttempts: maxAttempts,
    logger: quiet,
  });
}

function searchPipeline(resolver: MetadataResolver, searcher: ReleaseSearcher): RequestPipeline {
  return new RequestPipeline({
    mode: 'search',
    infoHash: TARGET,
    matchThreshold: 0.8,
    builder: makeBuilder(),
    resolver,
    searcher,
    logger: quiet,
  });
}

const MATCHING: Candidate = { name: 'Movie.Title.2024.2160p', infoHash: 'a'.repeat(40), sizeBytes: 4_000_000 };
const UNRELATED: Candidate = { name: 'Completely.Different.Film.1999', infoHash: 'b'.repeat(40), sizeBytes: 1_000 };

describe('RequestPipeline in fixed-hash mode', () => {
  it('builds a torrent carrying the configured hash', async () => {
    const pipeline = new RequestPipeline({
      mode: 'fixed',
      infoHash: TARGET,
      matchThreshold: 0.8,
      builder: makeBuilder(),
      logger: quiet,
    });

    const outcome = await pipeline.run('Movie.Title.2024.torrent');

    assert.equal(outcome.status, 'ok');
    assert.ok(outcome.status === 'ok');
    assert.equal(outcome.torrent.infoHash, TARGET);
    assert.equal(outcome.torrent.fileName, 'Movie.Title.2024.torrent');
    assert.equal(outcome.identity.title, 'Movie Title');
    assert.deepEqual(outcome.history, ['received', 'parsed', 'built', 'responded']);
  });

  it('reports a bruteforce miss as an error outcome', async () => {
    const pipeline = new RequestPipeline({
      mode: 'fixed',
      infoHash: TARGET,
      matchThreshold: 0.8,
      builder: makeBuilder('bruteforce', 2),
      logger: quiet,
    });

    const outcome = await pipeline.run('Name.torrent');

    assert.ok(outcome.status === 'error');
    assert.ok(outcome.error instanceof HashMismatchError);
    assert.deepEqual(outcome.history, ['received', 'parsed', 'failed', 'responded']);
  });
});

describe('RequestPipeline in search mode', () => {
  it('returns not_found for an empty name without calling collaborators', async () => {
    const resolver = new FakeResolver(null);
    const searcher = new FakeSearcher([MATCHING]);

    const outcome = await searchPipeline(resolver, searcher).run('  .torrent');

    assert.ok(outcome.status === 'not_found');
    assert.equal(outcome.reason, 'Empty filename');
    assert.deepEqual(outcome.history, ['received', 'failed', 'responded']);
    assert.equal(resolver.calls.length, 0);
    assert.equal(searcher.calls.length, 0);
  });

  it('returns not_found for a name made only of release markers', async () => {
    const resolver = new FakeResolver(null);
    const searcher = new FakeSearcher([MATCHING]);

    const outcome = await searchPipeline(resolver, searcher).run('S01E01.1080p.torrent');

    assert.ok(outcome.status === 'not_found');
    assert.equal(outcome.reason, 'Empty filename');
    assert.deepEqual(outcome.history, ['received', 'failed', 'responded']);
    assert.equal(resolver.calls.length, 0);
    assert.equal(searcher.calls.length, 0);
  });

  it('matches the best candidate and carries its infohash', async () => {
    const resolved: ResolvedMedia = { kind: 'movie', title: 'Movie Title', year: 2024, tmdbId: 42 };
    const resolver = new FakeResolver(resolved);
    const searcher = new FakeSearcher([UNRELATED, MATCHING]);

    const outcome = await searchPipeline(resolver, searcher).run('Movie.Title.2024.torrent');

    assert.ok(outcome.status === 'ok');
    assert.equal(outcome.torrent.infoHash, 'a'.repeat(40));
    assert.equal(outcome.torrent.spec.name, 'Movie.Title.2024.2160p');
    assert.equal(outcome.match?.candidate, MATCHING);
    assert.deepEqual(outcome.history, ['received', 'parsed', 'resolved', 'searched', 'matched', 'built', 'responded']);
    assert.equal(resolver.calls[0].source, 'Movie.Title.2024');
    assert.equal(searcher.calls[0], resolved);
  });

  it('searches the parsed identity when the resolver knows nothing', async () => {
    const searcher = new FakeSearcher([MATCHING]);

    const outcome = await searchPipeline(new FakeResolver(null), searcher).run('Movie.Title.2024.torrent');

    assert.equal(outcome.status, 'ok');
    assert.equal(searcher.calls.length, 1);
    assert.equal(searcher.calls[0].title, 'Movie Title');
    assert.equal(searcher.calls[0].year, 2024);
    assert.equal(searcher.calls[0].kind, 'movie');
  });

  it('returns not_found when no candidate reaches the threshold', async () => {
    const outcome = await searchPipeline(new FakeResolver(null), new FakeSearcher([UNRELATED])).run(
      'Movie.Title.2024.torrent'
    );

    assert.ok(outcome.status === 'not_found');
    assert.equal(outcome.reason, 'No release matched Movie.Title.2024');
    assert.deepEqual(outcome.history, ['received', 'parsed', 'resolved', 'searched', 'no_match', 'responded']);
  });

  it('maps a resolver outage to an error naming the service', async () => {
    const searcher = new FakeSearcher([MATCHING]);
    const resolver = new FakeResolver(new ResolverUnavailableError('Radarr', 'ECONNABORTED'));

    const outcome = await searchPipeline(resolver, searcher).run('Movie.Title.2024.torrent');

    assert.ok(outcome.status === 'error');
    assert.equal(outcome.reason, 'Radarr unavailable: ECONNABORTED');
    assert.deepEqual(outcome.history, ['received', 'parsed', 'failed', 'responded']);
    assert.equal(searcher.calls.length, 0);
  });

  it('maps a searcher outage to an error outcome', async () => {
    const searcher = new FakeSearcher(new SearcherUnavailableError('Prowlarr', 'HTTP 503'));

    const outcome = await searchPipeline(new FakeResolver(null), searcher).run('Movie.Title.2024.torrent');

    assert.ok(outcome.status === 'error');
    assert.ok(outcome.error instanceof SearcherUnavailableError);
    assert.equal(outcome.reason, 'Prowlarr unavailable: HTTP 503');
    assert.deepEqual(outcome.history, ['received', 'parsed', 'resolved', 'failed', 'responded']);
  });

  it('refuses to start without collaborators', () => {
    assert.throws(
      () => new RequestPipeline({ mode: 'search', infoHash: TARGET, matchThreshold: 0.8, builder: makeBuilder(), logger: quiet }),
      ConfigError
    );
  });
});

describe('identityToMedia', () => {
  it('carries episode numbering', () => {
    const media = identityToMedia(parseFilename('Show.Name.S02E03.torrent'));
    assert.equal(media.kind, 'episode');
    assert.equal(media.title, 'Show Name');
    assert.equal(media.season, 2);
    assert.equal(media.episode, 3);
  });
});
