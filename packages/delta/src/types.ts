/**
 * Delta types
 */

export type DeltaProgress =
  | { phase: 'reading' }
  | { phase: 'sorting' }
  /** `bytes` of the new input have been matched so far */
  | { phase: 'working'; bytes: number };

export type ProgressListener = (progress: DeltaProgress) => void;

export interface GenerateOptions {
  onProgress?: ProgressListener;
}

export interface ChunkedGenerateOptions extends GenerateOptions {
  /** Bytes of each input diffed together; smaller chunks use less memory but give larger patches */
  chunkSize?: number;
}

/**
 * Sequential reader. `read` returns fewer bytes than asked only at the end of input.
 */
export interface ByteReader {
  read(length: number): Promise<Buffer>;
}

/**
 * Reader addressed by absolute position, for the old input while applying
 */
export interface RandomAccessReader {
  readAt(position: number, length: number): Promise<Buffer>;
}
