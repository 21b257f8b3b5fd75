/**
 * @pipewright/delta
 * Binary delta patches for build artifacts
 */

export * from './types.js';
export {
  DELTA_MAGIC,
  ENTRY_HEADER_SIZE,
  PATCH_HEADER_SIZE,
  decodeEntryHeader,
  decodePatchHeader,
  encodeEntryHeader,
  encodePatchHeader,
} from './format.js';
export type { EntryHeader, PatchHeader } from './format.js';
export { buildSuffixArray } from './suffix-array.js';
export { generatePatch, generateChunkedPatch, MAX_CHUNK_SIZE, MAX_INPUT_SIZE } from './generate.js';
export { applyPatch, applyChunkedPatch } from './apply.js';
export { bufferReader, fileReader, readAll } from './readers.js';
export { diffFiles, patchFile } from './files.js';
