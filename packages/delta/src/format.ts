/**
 * Patch wire format
 *
 *   patch header  "DDELTA40" | new size (u64 BE)                 16 bytes
 *   entry header  diff (u64 BE) | extra (u64 BE) | seek (i64 BE)  24 bytes
 *   diff bytes    new - old, byte-wise modulo 256
 *   extra bytes   copied verbatim from new
 *
 * An all-zero entry header ends a patch. A chunked patch is a sequence of
 * complete patches, one per chunk.
 */

import { DeltaError } from '@pipewright/shared';

export const DELTA_MAGIC = Buffer.from('DDELTA40', 'ascii');
export const PATCH_HEADER_SIZE = 16;
export const ENTRY_HEADER_SIZE = 24;

export interface PatchHeader {
  magic: Buffer;
  newFileSize: number;
}

export interface EntryHeader {
  diff: number;
  extra: number;
  seek: number;
}

function toSafeNumber(value: bigint, field: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new DeltaError('apply', `Patch field '${field}' is out of range`);
  }
  return Number(value);
}

export function encodePatchHeader(newFileSize: number): Buffer {
  const header = Buffer.alloc(PATCH_HEADER_SIZE);
  DELTA_MAGIC.copy(header, 0);
  header.writeBigUInt64BE(BigInt(newFileSize), 8);
  return header;
}

export function decodePatchHeader(bytes: Buffer): PatchHeader {
  return {
    magic: bytes.subarray(0, DELTA_MAGIC.length),
    newFileSize: toSafeNumber(bytes.readBigUInt64BE(8), 'new_file_size'),
  };
}

export function encodeEntryHeader(entry: EntryHeader): Buffer {
  const header = Buffer.alloc(ENTRY_HEADER_SIZE);
  header.writeBigUInt64BE(BigInt(entry.diff), 0);
  header.writeBigUInt64BE(BigInt(entry.extra), 8);
  header.writeBigInt64BE(BigInt(entry.seek), 16);
  return header;
}

export function decodeEntryHeader(bytes: Buffer): EntryHeader {
  return {
    diff: toSafeNumber(bytes.readBigUInt64BE(0), 'diff'),
    extra: toSafeNumber(bytes.readBigUInt64BE(8), 'extra'),
    seek: toSafeNumber(bytes.readBigInt64BE(16), 'seek'),
  };
}

export const END_OF_PATCH = encodeEntryHeader({ diff: 0, extra: 0, seek: 0 });

export function isEndOfPatch(entry: EntryHeader): boolean {
  return entry.diff === 0 && entry.extra === 0 && entry.seek === 0;
}
