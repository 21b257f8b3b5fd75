/**
 * Patch generation
 *
 * bsdiff-style matching: for each position of the new input, binary-search the
 * suffix array of the old input for the longest match, extend approximate
 * matches forwards and backwards, and emit (diff, extra, seek) entries.
 */

import { DeltaError } from '@pipewright/shared';
import { END_OF_PATCH, encodeEntryHeader, encodePatchHeader } from './format.js';
import { buildSuffixArray } from './suffix-array.js';
import type {
  ByteReader,
  ChunkedGenerateOptions,
  DeltaProgress,
  GenerateOptions,
  ProgressListener,
} from './types.js';

/** Inputs must be smaller than 2^31 - 1 bytes */
export const MAX_INPUT_SIZE = 0x7fffffff;
export const MAX_CHUNK_SIZE = MAX_INPUT_SIZE - 1;

const FUZZ = 8;
const PROGRESS_INTERVAL = 10_000;
const MAX_STALLED_STEPS = 100;

const ignoreProgress: ProgressListener = () => undefined;

interface Match {
  length: number;
  position: number;
}

function matchLength(old: Uint8Array, oldStart: number, oldEnd: number, target: Uint8Array, targetStart: number): number {
  const limit = Math.min(oldEnd - oldStart, target.length - targetStart);
  let length = 0;
  while (length < limit && old[oldStart + length] === target[targetStart + length]) length++;
  return length;
}

/**
 * Compare the common prefix length of the two ranges only
 */
function compareCommon(old: Uint8Array, oldStart: number, oldEnd: number, target: Uint8Array, targetStart: number): number {
  const limit = Math.min(oldEnd - oldStart, target.length - targetStart);
  for (let i = 0; i < limit; i++) {
    const difference = old[oldStart + i] - target[targetStart + i];
    if (difference !== 0) return difference;
  }
  return 0;
}

/**
 * Longest prefix of `target[targetStart..]` found in `old[..oldEnd]`, between
 * suffix array slots `start` and `end` inclusive
 */
function search(
  sorted: Int32Array,
  old: Uint8Array,
  oldEnd: number,
  target: Uint8Array,
  targetStart: number,
  start: number,
  end: number
): Match {
  let low = start;
  let high = end;
  while (high - low >= 2) {
    const middle = low + Math.floor((high - low) / 2);
    if (compareCommon(old, sorted[middle], oldEnd, target, targetStart) <= 0) {
      low = middle;
    } else {
      high = middle;
    }
  }

  const lowLength = matchLength(old, sorted[low], oldEnd, target, targetStart);
  const highLength = matchLength(old, sorted[high], oldEnd, target, targetStart);
  return lowLength > highLength
    ? { length: lowLength, position: sorted[low] }
    : { length: highLength, position: sorted[high] };
}

/**
 * Generate a single patch turning `old` into `target`. The result is readable
 * by `applyPatch` and by `applyChunkedPatch`.
 */
export function generatePatch(old: Uint8Array, target: Uint8Array, options: GenerateOptions = {}): Buffer {
  const onProgress = options.onProgress ?? ignoreProgress;
  const oldSize = old.length;
  const newSize = target.length;
  if (Math.max(oldSize, newSize) >= MAX_INPUT_SIZE) {
    throw new DeltaError('generate', `The filesize must not be larger than ${MAX_INPUT_SIZE} bytes`);
  }

  onProgress({ phase: 'sorting' });
  const output: Buffer[] = [encodePatchHeader(newSize)];

  const sorted = new Int32Array(oldSize + 1);
  sorted.set(buildSuffixArray(old));
  // The final byte of old never takes part in a match
  const oldEnd = Math.max(oldSize - 1, 0);

  let scan = 0;
  let length = 0;
  let position = 0;
  let lastOffset = 0;
  let lastScan = 0;
  let lastPosition = 0;

  while (scan < newSize) {
    let stalled = 0;
    let oldScore = 0;
    scan += length;
    let scored = scan;

    while (scan < newSize) {
      if (scan % PROGRESS_INTERVAL === 0) {
        onProgress({ phase: 'working', bytes: scan });
      }
      const previousLength = length;
      const previousScore = oldScore;
      const previousPosition = position;

      const match = search(sorted, old, oldEnd, target, scan, 0, oldSize);
      length = match.length;
      position = match.position;

      for (; scored < scan + length; scored++) {
        if (scored + lastOffset < oldSize && old[scored + lastOffset] === target[scored]) oldScore++;
      }

      if ((length === oldScore && length !== 0) || length > oldScore + FUZZ) break;

      if (scan + lastOffset < oldSize && old[scan + lastOffset] === target[scan]) oldScore--;

      // A long stretch that differs from the previous match in fewer than FUZZ
      // bytes makes no progress; give up on it after a while
      const nearPrevious =
        previousLength - FUZZ <= length &&
        length <= previousLength &&
        previousScore - FUZZ <= oldScore &&
        oldScore <= previousScore &&
        previousPosition <= position &&
        position <= previousPosition + FUZZ &&
        oldScore <= length &&
        length <= oldScore + FUZZ;
      stalled = nearPrevious ? stalled + 1 : 0;
      if (stalled > MAX_STALLED_STEPS) break;

      scan++;
    }

    if (length === oldScore && scan !== newSize) continue;

    // Extend the previous match forwards
    let forward = 0;
    let forwardSame = 0;
    let forwardBest = 0;
    for (let i = 0; lastScan + i < scan && lastPosition + i < oldSize; ) {
      if (old[lastPosition + i] === target[lastScan + i]) forwardSame++;
      i++;
      if (forwardSame * 2 - i > forwardBest * 2 - forward) {
        forwardBest = forwardSame;
        forward = i;
      }
    }

    // Extend the new match backwards
    let backward = 0;
    if (scan < newSize) {
      let same = 0;
      let best = 0;
      for (let i = 1; scan >= lastScan + i && position >= i; i++) {
        if (old[position - i] === target[scan - i]) same++;
        if (same * 2 - i > best * 2 - backward) {
          best = same;
          backward = i;
        }
      }
    }

    // Split any overlap where it scores best
    if (lastScan + forward > scan - backward) {
      const overlap = lastScan + forward - (scan - backward);
      let score = 0;
      let bestScore = 0;
      let split = 0;
      for (let i = 0; i < overlap; i++) {
        if (target[lastScan + forward - overlap + i] === old[lastPosition + forward - overlap + i]) score++;
        if (target[scan - backward + i] === old[position - backward + i]) score--;
        if (score > bestScore) {
          bestScore = score;
          split = i + 1;
        }
      }
      forward += split - overlap;
      backward -= split;
    }

    const extra = scan - backward - (lastScan + forward);
    if (forward < 0 || extra < 0) {
      throw new DeltaError('generate', 'Invalid state while creating patch');
    }

    output.push(
      encodeEntryHeader({
        diff: forward,
        extra,
        seek: position - backward - (lastPosition + forward),
      })
    );
    if (forward > 0) {
      const diff = Buffer.alloc(forward);
      for (let i = 0; i < forward; i++) {
        diff[i] = (target[lastScan + i] - old[lastPosition + i]) & 0xff;
      }
      output.push(diff);
    }
    if (extra > 0) {
      output.push(Buffer.from(target.subarray(lastScan + forward, scan - backward)));
    }

    lastScan = scan - backward;
    lastPosition = position - backward;
    lastOffset = position - scan;
  }

  output.push(END_OF_PATCH);
  return Buffer.concat(output);
}

/**
 * Generate a chunked patch, diffing `chunkSize` bytes of each input at a time.
 * Only `applyChunkedPatch` reads the result correctly past the first chunk.
 */
export async function* generateChunkedPatch(
  old: ByteReader,
  target: ByteReader,
  options: ChunkedGenerateOptions = {}
): AsyncGenerator<Buffer> {
  const onProgress = options.onProgress ?? ignoreProgress;
  const chunkSize = Math.min(options.chunkSize ?? MAX_CHUNK_SIZE, MAX_CHUNK_SIZE);
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new DeltaError('generate', `Chunk size must be a positive integer, got ${chunkSize}`);
  }

  let completed = 0;
  for (;;) {
    onProgress({ phase: 'reading' });
    const newChunk = await target.read(chunkSize);
    if (newChunk.length === 0) {
      if (completed === 0) {
        yield encodePatchHeader(0);
        yield END_OF_PATCH;
      }
      return;
    }
    const oldChunk = await old.read(chunkSize);

    const offset = completed;
    yield generatePatch(oldChunk, newChunk, {
      onProgress: (progress: DeltaProgress) =>
        onProgress(progress.phase === 'working' ? { phase: 'working', bytes: progress.bytes + offset } : progress),
    });
    completed += newChunk.length;
  }
}
