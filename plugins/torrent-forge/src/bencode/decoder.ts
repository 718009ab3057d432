/**
 * Bencode Decoder
 *
 * Strict counterpart of the encoder: rejects anything the encoder would never
 * produce (leading zeros, negative zero, unsorted or repeated keys, keys that
 * are not UTF-8, trailing bytes), so decode(encode(x)) reproduces x and
 * encode(decode(b)) reproduces b.
 */

import { DecodingError } from '../errors.js';
import type { BencodeDict, BencodeValue } from './types.js';

const CHAR_I = 0x69;
const CHAR_L = 0x6c;
const CHAR_D = 0x64;
const CHAR_E = 0x65;
const CHAR_COLON = 0x3a;
const CHAR_0 = 0x30;
const CHAR_9 = 0x39;

const INTEGER_PATTERN = /^-?(0|[1-9][0-9]*)$/;
const MAX_DEPTH = 256;

export class BencodeDecoder {
  private position = 0;

  private constructor(private readonly data: Buffer) {}

  static decode(data: Uint8Array): BencodeValue {
    const decoder = new BencodeDecoder(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
    const value = decoder.readValue(0);
    if (decoder.position !== decoder.data.length) {
      throw new DecodingError('Trailing data after bencoded value', decoder.position);
    }
    return value;
  }

  private peek(): number {
    if (this.position >= this.data.length) {
      throw new DecodingError('Unexpected end of data', this.position);
    }
    return this.data[this.position];
  }

  private readValue(depth: number): BencodeValue {
    if (depth > MAX_DEPTH) {
      throw new DecodingError('Nesting too deep', this.position);
    }

    const byte = this.peek();
    if (byte === CHAR_I) return this.readInteger();
    if (byte === CHAR_L) return this.readList(depth);
    if (byte === CHAR_D) return this.readDict(depth);
    if (byte >= CHAR_0 && byte <= CHAR_9) return this.readBytes();

    throw new DecodingError(`Unexpected byte 0x${byte.toString(16).padStart(2, '0')}`, this.position);
  }

  private readInteger(): number | bigint {
    const start = this.position;
    const end = this.data.indexOf(CHAR_E, start + 1);
    if (end === -1) {
      throw new DecodingError('Unterminated integer', start);
    }

    const text = this.data.toString('ascii', start + 1, end);
    if (!INTEGER_PATTERN.test(text) || text === '-0') {
      throw new DecodingError(`Invalid integer "${text}"`, start);
    }

    this.position = end + 1;
    const asNumber = Number(text);
    return Number.isSafeInteger(asNumber) ? asNumber : BigInt(text);
  }

  private readBytes(): Buffer {
    const start = this.position;
    const colon = this.data.indexOf(CHAR_COLON, start);
    if (colon === -1) {
      throw new DecodingError('Unterminated byte string length', start);
    }

    const lengthText = this.data.toString('ascii', start, colon);
    if (!/^(0|[1-9][0-9]*)$/.test(lengthText)) {
      throw new DecodingError(`Invalid byte string length "${lengthText}"`, start);
    }

    const length = Number(lengthText);
    const bodyStart = colon + 1;
    if (bodyStart + length > this.data.length) {
      throw new DecodingError(`Byte string of length ${length} exceeds input`, start);
    }

    this.position = bodyStart + length;
    return Buffer.from(this.data.subarray(bodyStart, this.position));
  }

  private readList(depth: number): BencodeValue[] {
    this.position++;
    const items: BencodeValue[] = [];
    while (this.peek() !== CHAR_E) {
      items.push(this.readValue(depth + 1));
    }
    this.position++;
    return items;
  }

  private readDict(depth: number): BencodeDict {
    this.position++;
    const dict: BencodeDict = {};
    let previousKey: Buffer | null = null;

    while (this.peek() !== CHAR_E) {
      const keyOffset = this.position;
      const byte = this.peek();
      if (byte < CHAR_0 || byte > CHAR_9) {
        throw new DecodingError('Mapping key must be a byte string', keyOffset);
      }

      const key = this.readBytes();
      const name = key.toString('utf8');
      if (!Buffer.from(name, 'utf8').equals(key)) {
        throw new DecodingError('Mapping key is not valid UTF-8', keyOffset);
      }
      if (previousKey && Buffer.compare(previousKey, key) >= 0) {
        throw new DecodingError(`Mapping key "${name}" is out of order or repeated`, keyOffset);
      }
      previousKey = key;

      Object.defineProperty(dict, name, {
        value: this.readValue(depth + 1),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }

    this.position++;
    return dict;
  }
}

export function decode(data: Uint8Array): BencodeValue {
  return BencodeDecoder.decode(data);
}
