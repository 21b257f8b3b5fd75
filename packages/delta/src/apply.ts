/**
 * Patch application
 */

import { DeltaError } from '@pipewright/shared';
import {
  DELTA_MAGIC,
  ENTRY_HEADER_SIZE,
  PATCH_HEADER_SIZE,
  decodeEntryHeader,
  decodePatchHeader,
  isEndOfPatch,
  type PatchHeader,
} from './format.js';
import type { ByteReader, RandomAccessReader } from './types.js';

const BLOCK_SIZE = 32 * 1024;

async function readExact(reader: ByteReader, length: number): Promise<Buffer> {
  const bytes = await reader.read(length);
  if (bytes.length < length) {
    throw new DeltaError('apply', 'Unexpected end of patch');
  }
  return bytes;
}

async function readOld(old: RandomAccessReader, position: number, length: number): Promise<Buffer> {
  const bytes = await old.readAt(position, length);
  if (bytes.length < length) {
    throw new DeltaError('apply', 'Unexpected end of old file');
  }
  return bytes;
}

/**
 * Apply the entries following `header`, reading old bytes from `oldStart` on
 */
async function* applyEntries(
  old: RandomAccessReader,
  oldStart: number,
  patch: ByteReader,
  header: PatchHeader
): AsyncGenerator<Buffer> {
  if (!header.magic.equals(DELTA_MAGIC)) {
    throw new DeltaError('apply', 'Invalid magic number');
  }

  let oldPosition = oldStart;
  let written = 0;
  for (;;) {
    const entry = decodeEntryHeader(await readExact(patch, ENTRY_HEADER_SIZE));
    if (isEndOfPatch(entry)) {
      if (written !== header.newFileSize) {
        throw new DeltaError('apply', 'Patch too short');
      }
      return;
    }

    for (let remaining = entry.diff; remaining > 0; ) {
      const size = Math.min(BLOCK_SIZE, remaining);
      const delta = await readExact(patch, size);
      const block = await readOld(old, oldPosition, size);
      for (let i = 0; i < size; i++) {
        block[i] = (block[i] + delta[i]) & 0xff;
      }
      yield block;
      oldPosition += size;
      remaining -= size;
    }

    for (let remaining = entry.extra; remaining > 0; ) {
      const size = Math.min(BLOCK_SIZE, remaining);
      yield await readExact(patch, size);
      remaining -= size;
    }

    oldPosition += entry.seek;
    if (oldPosition < 0) {
      throw new DeltaError('apply', 'Patch seeks before the start of the old file');
    }
    written += entry.diff + entry.extra;
  }
}

/**
 * Apply a single patch, as written by `generatePatch`. Only the first chunk
 * of a chunked patch is applied.
 */
export async function* applyPatch(old: RandomAccessReader, patch: ByteReader): AsyncGenerator<Buffer> {
  const header = decodePatchHeader(await readExact(patch, PATCH_HEADER_SIZE));
  yield* applyEntries(old, 0, patch, header);
}

/**
 * Apply a patch written by `generatePatch` or `generateChunkedPatch`. Each
 * chunk reads the old input from where the previous chunk's output ended.
 * A header cut short is an error.
 */
export async function* applyChunkedPatch(old: RandomAccessReader, patch: ByteReader): AsyncGenerator<Buffer> {
  let total = 0;
  for (;;) {
    const bytes = await patch.read(PATCH_HEADER_SIZE);
    if (bytes.length === 0) return;
    if (bytes.length < PATCH_HEADER_SIZE) {
      throw new DeltaError('apply', 'Unexpected end of patch');
    }

    const header = decodePatchHeader(bytes);
    const oldStart = total;
    total += header.newFileSize;
    yield* applyEntries(old, oldStart, patch, header);
  }
}
