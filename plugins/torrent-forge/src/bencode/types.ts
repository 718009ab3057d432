/**
 * Bencode value model
 */

export type BencodeValue = number | bigint | Buffer | BencodeValue[] | BencodeDict;

export interface BencodeDict {
  [key: string]: BencodeValue;
}

export function isBencodeDict(value: BencodeValue | undefined): value is BencodeDict {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Buffer.isBuffer(value) &&
    !Array.isArray(value)
  );
}

export function isBencodeList(value: BencodeValue | undefined): value is BencodeValue[] {
  return Array.isArray(value);
}
