/**
 * File-to-file delta operations
 */

import { createWriteStream } from 'node:fs';
import { open, stat, type FileHandle } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { createLogger } from '@pipewright/shared';
import { applyChunkedPatch } from './apply.js';
import { generateChunkedPatch } from './generate.js';
import { fileReader } from './readers.js';
import type { ChunkedGenerateOptions } from './types.js';

const logger = createLogger('Delta');

async function withFile<T>(path: string, task: (handle: FileHandle) => Promise<T>): Promise<T> {
  const handle = await open(path, 'r');
  try {
    return await task(handle);
  } finally {
    await handle.close();
  }
}

/**
 * Write a chunked patch from `oldPath` to `newPath` into `patchPath`
 */
export async function diffFiles(
  oldPath: string,
  newPath: string,
  patchPath: string,
  options: ChunkedGenerateOptions = {}
): Promise<void> {
  await withFile(oldPath, (oldFile) =>
    withFile(newPath, (newFile) =>
      pipeline(generateChunkedPatch(fileReader(oldFile), fileReader(newFile), options), createWriteStream(patchPath))
    )
  );

  const { size } = await stat(patchPath);
  logger.info({ oldPath, newPath, patchPath, patchBytes: size }, 'Patch generated');
}

/**
 * Rebuild `newPath` from `oldPath` and a single or chunked patch
 */
export async function patchFile(oldPath: string, patchPath: string, newPath: string): Promise<void> {
  await withFile(oldPath, (oldFile) =>
    withFile(patchPath, (patchFileHandle) =>
      pipeline(applyChunkedPatch(fileReader(oldFile), fileReader(patchFileHandle)), createWriteStream(newPath))
    )
  );

  logger.info({ oldPath, patchPath, newPath }, 'Patch applied');
}
