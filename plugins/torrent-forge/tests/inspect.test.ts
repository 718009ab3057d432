/**
 * Reading encoded torrents back
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { encode } from '../src/bencode/index.js';
import { TorrentBuilder } from '../src/torrent/builder.js';
import { inspectTorrent } from '../src/torrent/inspect.js';
import { DecodingError } from '../src/errors.js';

const TARGET = '41e6cd50ccec55cd5704c5e3d176e7b59317a3fb';

describe('inspectTorrent', () => {
  it('summarizes a built torrent', () => {
    const builder = new TorrentBuilder({
      defaults: {
        announceList: ['udp://tracker.test:1337/announce'],
        pieceLength: 16384,
        fakeFileSize: 65536,
        createdBy: 'torrent-forge',
        comment: 'Created by torrent-forge',
        isPrivate: true,
      },
      fixedHashPolicy: 'assert',
      fixedHashMaxAttempts: 1,
      now: () => new Date('2024-01-01T00:00:00Z'),
    });
    const built = builder.buildFixed('Show.Name.S01E02', TARGET);

    const summary = inspectTorrent(built.bytes);

    assert.equal(summary.name, 'Show.Name.S01E02');
    assert.equal(summary.length, 65536);
    assert.equal(summary.pieceLength, 16384);
    assert.equal(summary.pieceCount, 4);
    assert.equal(summary.isPrivate, true);
    assert.deepEqual(summary.announceList, ['udp://tracker.test:1337/announce']);
    assert.equal(summary.createdBy, 'torrent-forge');
    assert.equal(summary.creationDate?.toISOString(), '2024-01-01T00:00:00.000Z');
    assert.equal(summary.carriedInfoHash, TARGET);
    assert.equal(summary.computedInfoHash, built.computedInfoHash);
  });

  it('rejects documents without an info dictionary', () => {
    assert.throws(() => inspectTorrent(encode({ announce: 'x' })), /Missing info dictionary/);
    assert.throws(() => inspectTorrent(encode([1])), DecodingError);
  });
});
