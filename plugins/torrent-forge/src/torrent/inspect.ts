/**
 * Read back the fields of an encoded torrent
 */

import { decode, infoHashOf, isBencodeDict, isBencodeList, type BencodeValue } from '../bencode/index.js';
import { DecodingError } from '../errors.js';

export interface TorrentSummary {
  name: string;
  length: number | bigint;
  pieceLength: number | bigint;
  pieceCount: number;
  isPrivate: boolean;
  announceList: string[];
  comment?: string;
  createdBy?: string;
  creationDate?: Date;
  /** Infohash carried in the top-level mapping, if any */
  carriedInfoHash?: string;
  /** SHA-1 of the encoded info mapping */
  computedInfoHash: string;
}

function text(value: BencodeValue | undefined): string | undefined {
  return Buffer.isBuffer(value) ? value.toString('utf8') : undefined;
}

function integer(value: BencodeValue | undefined): number | bigint | undefined {
  return typeof value === 'number' || typeof value === 'bigint' ? value : undefined;
}

/**
 * @throws DecodingError when the bytes are not a single-file torrent
 */
export function inspectTorrent(bytes: Uint8Array): TorrentSummary {
  const root = decode(bytes);
  if (!isBencodeDict(root)) {
    throw new DecodingError('Top-level value is not a dictionary', 0);
  }

  const info = root.info;
  if (!isBencodeDict(info)) {
    throw new DecodingError('Missing info dictionary', 0);
  }

  const name = text(info.name);
  const length = integer(info.length);
  const pieceLength = integer(info['piece length']);
  const pieces = info.pieces;
  if (name === undefined || length === undefined || pieceLength === undefined || !Buffer.isBuffer(pieces)) {
    throw new DecodingError('Info dictionary lacks name, length, piece length or pieces', 0);
  }

  const announceList: string[] = [];
  const tiers = root['announce-list'];
  if (isBencodeList(tiers)) {
    for (const tier of tiers) {
      if (!isBencodeList(tier)) continue;
      for (const url of tier) {
        const value = text(url);
        if (value !== undefined) announceList.push(value);
      }
    }
  }
  const announce = text(root.announce);
  if (announce !== undefined && !announceList.includes(announce)) {
    announceList.unshift(announce);
  }

  const creationDate = integer(root['creation date']);

  return {
    name,
    length,
    pieceLength,
    pieceCount: Math.floor(pieces.length / 20),
    isPrivate: integer(info.private) === 1,
    announceList,
    comment: text(root.comment),
    createdBy: text(root['created by']),
    creationDate: creationDate !== undefined ? new Date(Number(creationDate) * 1000) : undefined,
    carriedInfoHash: text(root.infohash),
    computedInfoHash: infoHashOf(info),
  };
}
