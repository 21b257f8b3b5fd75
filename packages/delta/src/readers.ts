/**
 * Byte sources for patch generation and application
 */

import type { FileHandle } from 'node:fs/promises';
import type { ByteReader, RandomAccessReader } from './types.js';

const READ_SIZE = 64 * 1024;

/**
 * Reader over an in-memory buffer. `readAt` returns a copy.
 */
export function bufferReader(data: Uint8Array): ByteReader & RandomAccessReader {
  let offset = 0;
  return {
    async read(length: number): Promise<Buffer> {
      const bytes = Buffer.from(data.subarray(offset, offset + length));
      offset += bytes.length;
      return bytes;
    },
    async readAt(position: number, length: number): Promise<Buffer> {
      return Buffer.from(data.subarray(position, position + length));
    },
  };
}

/**
 * Reader over an open file, reading forward from the start for `read`
 */
export function fileReader(handle: FileHandle): ByteReader & RandomAccessReader {
  let offset = 0;

  const readAt = async (position: number, length: number): Promise<Buffer> => {
    const pieces: Buffer[] = [];
    let total = 0;
    while (total < length) {
      const piece = Buffer.alloc(Math.min(READ_SIZE, length - total));
      const { bytesRead } = await handle.read(piece, 0, piece.length, position + total);
      if (bytesRead === 0) break;
      pieces.push(piece.subarray(0, bytesRead));
      total += bytesRead;
    }
    return Buffer.concat(pieces, total);
  };

  return {
    async read(length: number): Promise<Buffer> {
      const bytes = await readAt(offset, length);
      offset += bytes.length;
      return bytes;
    },
    readAt,
  };
}

export async function readAll(chunks: AsyncIterable<Buffer>): Promise<Buffer> {
  const collected: Buffer[] = [];
  for await (const chunk of chunks) collected.push(chunk);
  return Buffer.concat(collected);
}
