/**
 * Release filename parser
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FilenameParser, parseFilename } from '../src/parsers/filename-parser.js';

describe('FilenameParser', () => {
  it('parses a scene-style movie release', () => {
    const identity = parseFilename('Movie.Title.2024.2160p.BluRay.x265-GROUP.torrent');

    assert.equal(identity.source, 'Movie.Title.2024.2160p.BluRay.x265-GROUP');
    assert.equal(identity.title, 'Movie Title');
    assert.equal(identity.year, 2024);
    assert.equal(identity.kind, 'movie');
    assert.equal(identity.season, undefined);
    assert.deepEqual([...identity.quality].sort(), ['2160p', 'BluRay', 'x265']);
    assert.equal(identity.releaseGroup, 'GROUP');
  });

  it('parses an episode release', () => {
    const identity = parseFilename('Show.Name.S01E02.1080p.WEB-DL.x264-GRP.torrent');

    assert.equal(identity.title, 'Show Name');
    assert.equal(identity.kind, 'episode');
    assert.equal(identity.season, 1);
    assert.equal(identity.episode, 2);
    assert.equal(identity.year, undefined);
    assert.deepEqual([...identity.quality].sort(), ['1080p', 'WEB-DL', 'x264']);
    assert.equal(identity.releaseGroup, 'GRP');
  });

  it('reads the 1x05 episode form', () => {
    const identity = parseFilename('Show Name 1x05.torrent');
    assert.equal(identity.title, 'Show Name');
    assert.equal(identity.season, 1);
    assert.equal(identity.episode, 5);
  });

  it('takes the last year before the release tokens', () => {
    const identity = parseFilename('Blade.Runner.2049.2017.2160p.torrent');
    assert.equal(identity.title, 'Blade Runner 2049');
    assert.equal(identity.year, 2017);
  });

  it('keeps a year-shaped first token in the title', () => {
    const identity = parseFilename('1917.2019.1080p.BluRay.torrent');
    assert.equal(identity.title, '1917');
    assert.equal(identity.year, 2019);
  });

  it('falls back to the whole stem as the title', () => {
    const identity = parseFilename('Some Random Name.torrent');
    assert.equal(identity.title, 'Some Random Name');
    assert.equal(identity.year, undefined);
    assert.equal(identity.quality.size, 0);
    assert.equal(identity.releaseGroup, undefined);
    assert.equal(identity.kind, 'movie');
  });

  it('keeps a lone release token as the title', () => {
    assert.equal(parseFilename('2160p.torrent').title, '2160p');
  });

  it('reads season and episode from Show.Name.S02E05.1080p', () => {
    const identity = parseFilename('Show.Name.S02E05.1080p.torrent');
    assert.equal(identity.title, 'Show Name');
    assert.equal(identity.kind, 'episode');
    assert.equal(identity.season, 2);
    assert.equal(identity.episode, 5);
    assert.deepEqual([...identity.quality], ['1080p']);
  });

  it('does not read release tokens out of the group name', () => {
    const identity = parseFilename('The.Movie.2024.1080p.WEB.DV.HDR-TS.torrent');
    assert.equal(identity.title, 'The Movie');
    assert.equal(identity.releaseGroup, 'TS');
    assert.deepEqual([...identity.quality], ['1080p', 'WEB-DL', 'HDR', 'DV']);

    const dolby = parseFilename('The.Movie.2024.1080p.BluRay-DD.torrent');
    assert.equal(dolby.releaseGroup, 'DD');
    assert.deepEqual([...dolby.quality], ['1080p', 'BluRay']);
  });

  it('drops markers from a name that starts with its episode', () => {
    const identity = parseFilename('S01E01.Pilot.1080p-GRP.torrent');
    assert.equal(identity.title, 'Pilot');
    assert.equal(identity.season, 1);
    assert.equal(identity.episode, 1);
    assert.equal(identity.releaseGroup, 'GRP');
    assert.deepEqual([...identity.quality], ['1080p']);
  });

  it('leaves the title empty when the name holds only markers', () => {
    const identity = parseFilename('S01E01.1080p.torrent');
    assert.equal(identity.title, '');
    assert.equal(identity.season, 1);
    assert.equal(identity.episode, 1);

    assert.equal(parseFilename('....torrent').title, '');
  });

  it('returns a frozen identity', () => {
    assert.ok(Object.isFrozen(parseFilename('Movie.2024.torrent')));
  });
});

describe('FilenameParser.stripExtension', () => {
  it('removes download and container extensions case-insensitively', () => {
    assert.equal(FilenameParser.stripExtension('  Name.TORRENT '), 'Name');
    assert.equal(FilenameParser.stripExtension('Name.nzb'), 'Name');
    assert.equal(FilenameParser.stripExtension('Name.2024.mkv'), 'Name.2024');
  });

  it('leaves nothing of a bare extension', () => {
    assert.equal(FilenameParser.stripExtension('.torrent'), '');
  });
});
