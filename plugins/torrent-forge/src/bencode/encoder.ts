/**
 * Bencode Encoder
 *
 * Canonical encoding: mapping keys are byte strings written in ascending
 * raw-byte order, so equal logical content always yields equal bytes and the
 * same infohash.
 */

import { EncodingError } from '../errors.js';

const LIST_START = Buffer.from('l');
const DICT_START = Buffer.from('d');
const END = Buffer.from('e');

interface KeyedEntry {
  key: Buffer;
  value: unknown;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const ctor = Object.getPrototypeOf(value)?.constructor?.name;
    return ctor ? `${ctor} instance` : 'object';
  }
  return typeof value;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function keyToBuffer(key: unknown, path: string): Buffer {
  if (typeof key === 'string') return Buffer.from(key, 'utf8');
  if (key instanceof Uint8Array) return Buffer.from(key);
  throw new EncodingError(`Mapping key at ${path} must be a byte string, got ${describe(key)}`);
}

export class BencodeEncoder {
  private chunks: Buffer[] = [];
  private stack = new Set<object>();

  static encode(value: unknown): Buffer {
    const encoder = new BencodeEncoder();
    encoder.write(value, '$');
    return Buffer.concat(encoder.chunks);
  }

  private write(value: unknown, path: string): void {
    if (typeof value === 'number') {
      if (!Number.isSafeInteger(value)) {
        throw new EncodingError(`Unsupported number at ${path}: ${value} (only safe integers are encodable)`);
      }
      this.chunks.push(Buffer.from(`i${value}e`));
      return;
    }

    if (typeof value === 'bigint') {
      this.chunks.push(Buffer.from(`i${value.toString()}e`));
      return;
    }

    if (typeof value === 'string') {
      this.writeBytes(Buffer.from(value, 'utf8'));
      return;
    }

    if (value instanceof Uint8Array) {
      this.writeBytes(value);
      return;
    }

    if (typeof value !== 'object' || value === null) {
      throw new EncodingError(`Unsupported value kind at ${path}: ${describe(value)}`);
    }

    if (this.stack.has(value)) {
      throw new EncodingError(`Cyclic structure at ${path}`);
    }
    this.stack.add(value);

    if (Array.isArray(value)) {
      this.chunks.push(LIST_START);
      value.forEach((item, index) => this.write(item, `${path}[${index}]`));
      this.chunks.push(END);
    } else if (value instanceof Map) {
      const entries: KeyedEntry[] = [];
      for (const [key, item] of value) {
        entries.push({ key: keyToBuffer(key, path), value: item });
      }
      this.writeDict(entries, path);
    } else if (isPlainObject(value)) {
      const entries: KeyedEntry[] = [];
      for (const [key, item] of Object.entries(value)) {
        // Absent optional fields are left out rather than rejected
        if (item === undefined) continue;
        entries.push({ key: Buffer.from(key, 'utf8'), value: item });
      }
      this.writeDict(entries, path);
    } else {
      throw new EncodingError(`Unsupported value kind at ${path}: ${describe(value)}`);
    }

    this.stack.delete(value);
  }

  private writeBytes(bytes: Uint8Array): void {
    this.chunks.push(Buffer.from(`${bytes.length}:`), Buffer.from(bytes));
  }

  private writeDict(entries: KeyedEntry[], path: string): void {
    entries.sort((a, b) => Buffer.compare(a.key, b.key));

    for (let i = 1; i < entries.length; i++) {
      if (entries[i - 1].key.equals(entries[i].key)) {
        throw new EncodingError(`Duplicate mapping key at ${path}: ${entries[i].key.toString('utf8')}`);
      }
    }

    this.chunks.push(DICT_START);
    for (const entry of entries) {
      this.writeBytes(entry.key);
      this.write(entry.value, `${path}.${entry.key.toString('utf8')}`);
    }
    this.chunks.push(END);
  }
}

/**
 * Encode a value into canonical bencoding.
 * @throws EncodingError for floats, booleans, null, non-byte-string keys and cycles
 */
export function encode(value: unknown): Buffer {
  return BencodeEncoder.encode(value);
}
