import { createHash } from 'crypto';
import { encode } from './encoder.js';
import type { BencodeDict } from './types.js';

export { encode, BencodeEncoder } from './encoder.js';
export { decode, BencodeDecoder } from './decoder.js';
export * from './types.js';

/** SHA-1 hex digest of the canonical encoding of an info mapping */
export function infoHashOf(info: BencodeDict): string {
  return createHash('sha1').update(encode(info)).digest('hex');
}
