/**
 * Torrent Builder
 * Assembles info and top-level mappings and encodes the final .torrent bytes
 */

import { createHash } from 'crypto';
import { createLogger, isPowerOfTwo, type Logger } from '@torrent-forge/plugin-utils';
import { encode, infoHashOf, type BencodeDict, type BencodeValue } from '../bencode/index.js';
import { EncodingError, HashMismatchError } from '../errors.js';
import type { BuiltTorrent, Candidate, FixedHashPolicy, TorrentDefaults, TorrentSpec } from '../types.js';

export const INFO_HASH_PATTERN = /^[0-9a-f]{40}$/;

const MIN_PIECE_LENGTH = 16 * 1024;
const MAX_PIECE_LENGTH = 16 * 1024 * 1024;
const TARGET_MAX_PIECES = 2048;

export interface TorrentBuilderOptions {
  defaults: TorrentDefaults;
  fixedHashPolicy: FixedHashPolicy;
  fixedHashMaxAttempts: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Deterministic placeholder pieces: piece i is SHA-1(seed + i).
 * At least one piece is produced, even for empty content.
 */
export function placeholderPieces(seed: string, length: number, pieceLength: number): Buffer {
  const count = Math.max(1, Math.ceil(length / pieceLength));
  const digests: Buffer[] = [];
  for (let i = 0; i < count; i++) {
    digests.push(createHash('sha1').update(`${seed}${i}`).digest());
  }
  return Buffer.concat(digests);
}

/**
 * Smallest power-of-two piece length keeping the piece count at or under 2048
 */
export function choosePieceLength(length: number): number {
  let pieceLength = MIN_PIECE_LENGTH;
  while (Math.ceil(length / pieceLength) > TARGET_MAX_PIECES && pieceLength < MAX_PIECE_LENGTH) {
    pieceLength *= 2;
  }
  return pieceLength;
}

function assertValidSpec(spec: TorrentSpec): void {
  if (spec.name.length === 0) {
    throw new EncodingError('Torrent name must not be empty');
  }
  if (!isPowerOfTwo(spec.pieceLength)) {
    throw new EncodingError(`Piece length ${spec.pieceLength} is not a positive power of two`);
  }
  if (!Number.isSafeInteger(spec.length) || spec.length < 0) {
    throw new EncodingError(`Length ${spec.length} is not a non-negative integer`);
  }
  if (spec.pieces.length === 0 || spec.pieces.length % 20 !== 0) {
    throw new EncodingError(`Pieces length ${spec.pieces.length} is not a positive multiple of 20`);
  }
  if (spec.infoHashOverride !== undefined && !INFO_HASH_PATTERN.test(spec.infoHashOverride)) {
    throw new EncodingError(`Infohash override "${spec.infoHashOverride}" is not 40 lowercase hex characters`);
  }
}

export function toInfoDict(spec: TorrentSpec): BencodeDict {
  const info: BencodeDict = {
    length: spec.length,
    name: Buffer.from(spec.name, 'utf8'),
    'piece length': spec.pieceLength,
    pieces: spec.pieces,
  };
  if (spec.isPrivate) {
    info.private = 1;
  }
  if (spec.nonce !== undefined && spec.nonce > 0) {
    info.nonce = spec.nonce;
  }
  return info;
}

export function toTorrentDict(spec: TorrentSpec): BencodeDict {
  const torrent: BencodeDict = { info: toInfoDict(spec) };

  if (spec.announceList.length > 0) {
    torrent.announce = Buffer.from(spec.announceList[0]);
    torrent['announce-list'] = spec.announceList.map((url): BencodeValue => [Buffer.from(url)]);
  }
  if (spec.comment) {
    torrent.comment = Buffer.from(spec.comment, 'utf8');
  }
  if (spec.createdBy) {
    torrent['created by'] = Buffer.from(spec.createdBy, 'utf8');
  }
  if (spec.creationDate !== undefined) {
    torrent['creation date'] = spec.creationDate;
  }
  if (spec.infoHashOverride !== undefined) {
    torrent.infohash = Buffer.from(spec.infoHashOverride);
  }

  return torrent;
}

export class TorrentBuilder {
  private readonly defaults: TorrentDefaults;
  private readonly policy: FixedHashPolicy;
  private readonly maxAttempts: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: TorrentBuilderOptions) {
    this.defaults = options.defaults;
    this.policy = options.fixedHashPolicy;
    this.maxAttempts = options.fixedHashMaxAttempts;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('torrent-forge:builder');
  }

  /**
   * TorrentSpec for fixed-hash mode. Under the assert policy the pieces are seeded
   * with the target hash; under bruteforce they are seeded with the name, so
   * the info mapping depends only on the request and the nonce.
   */
  fixedSpec(name: string, infoHash: string): TorrentSpec {
    const target = infoHash.toLowerCase();
    const seed = this.policy === 'assert' ? target : name;
    const length = this.defaults.fakeFileSize;

    return {
      ...this.commonFields(),
      name,
      pieceLength: this.defaults.pieceLength,
      pieces: placeholderPieces(seed, length, this.defaults.pieceLength),
      length,
      infoHashOverride: this.policy === 'assert' ? target : undefined,
    };
  }

  /**
   * TorrentSpec for search mode: name and size come from the matched release and
   * its real infohash is carried alongside.
   */
  candidateSpec(candidate: Candidate): TorrentSpec {
    const length = candidate.sizeBytes > 0 ? Math.floor(candidate.sizeBytes) : this.defaults.fakeFileSize;
    const pieceLength = choosePieceLength(length);
    const infoHash = candidate.infoHash.toLowerCase();

    return {
      ...this.commonFields(),
      name: candidate.name,
      pieceLength,
      pieces: placeholderPieces(infoHash, length, pieceLength),
      length,
      infoHashOverride: infoHash,
    };
  }

  buildFixed(name: string, infoHash: string): BuiltTorrent {
    const spec = this.fixedSpec(name, infoHash);
    const fileName = `${name}.torrent`;

    if (this.policy === 'assert') {
      return this.encode(spec, fileName);
    }

    const target = infoHash.toLowerCase();
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const variant: TorrentSpec = attempt === 0 ? spec : { ...spec, nonce: attempt };
      if (infoHashOf(toInfoDict(variant)) === target) {
        this.logger.debug('Target infohash reached', { name, attempt });
        return this.encode(variant, fileName);
      }
    }

    throw new HashMismatchError(target, this.maxAttempts);
  }

  buildFromCandidate(name: string, candidate: Candidate): BuiltTorrent {
    return this.encode(this.candidateSpec(candidate), `${name}.torrent`);
  }

  /**
   * Encode a spec. Equal specs always produce identical bytes.
   */
  encode(spec: TorrentSpec, fileName = `${spec.name}.torrent`): BuiltTorrent {
    assertValidSpec(spec);

    const torrent = toTorrentDict(spec);
    const bytes = encode(torrent);
    const computedInfoHash = infoHashOf(toInfoDict(spec));

    return {
      fileName,
      bytes,
      infoHash: spec.infoHashOverride ?? computedInfoHash,
      computedInfoHash,
      spec,
    };
  }

  private commonFields(): Pick<TorrentSpec, 'announceList' | 'comment' | 'createdBy' | 'creationDate' | 'isPrivate'> {
    return {
      announceList: [...this.defaults.announceList],
      comment: this.defaults.comment,
      createdBy: this.defaults.createdBy,
      creationDate: Math.floor(this.now().getTime() / 1000),
      isPrivate: this.defaults.isPrivate,
    };
  }
}
