/**
 * Directory snapshots
 *
 * Capturing a directory hashes each file as a stream; contents stay on disk
 * until a store or `applySnapshot` reads them through `openFile`.
 */

import { createHash } from 'node:crypto';
import { createReadStream, createWriteStream } from 'node:fs';
import { chmod, mkdir, readdir, rm, stat } from 'node:fs/promises';
import { dirname, join, posix, relative, sep } from 'node:path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { DirectorySnapshot, SnapshotFile } from '@pipewright/shared';

export interface SnapshotContent {
  path: string;
  content: Buffer;
  mode: number;
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toPosixPath(path: string): string {
  return path.split(sep).join(posix.sep);
}

export function resolveSnapshotPath(root: string, path: string): string {
  return join(root, ...path.split(posix.sep));
}

function sha256(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Digest over the file list, independent of walk order
 */
export function computeDigest(files: readonly SnapshotFile[]): string {
  const hash = createHash('sha256');
  const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const file of sorted) {
    hash.update(`${file.path}\0${file.mode.toString(8)}\0${file.size}\0${file.sha256}\n`);
  }
  return hash.digest('hex');
}

function describeFiles(files: SnapshotFile[], openFile: (path: string) => Readable): DirectorySnapshot {
  return {
    files,
    digest: computeDigest(files),
    sizeBytes: files.reduce((total, file) => total + file.size, 0),
    openFile,
  };
}

/**
 * Snapshot whose contents are held in memory
 */
export function createMemorySnapshot(entries: readonly SnapshotContent[]): DirectorySnapshot {
  const contents = new Map(entries.map((entry) => [entry.path, entry.content]));
  const files = entries.map((entry) => ({
    path: entry.path,
    mode: entry.mode,
    size: entry.content.length,
    sha256: sha256(entry.content),
  }));

  return describeFiles(files, (path) => {
    const content = contents.get(path);
    if (!content) {
      throw new Error(`Snapshot has no file '${path}'`);
    }
    return Readable.from(content);
  });
}

/**
 * Snapshot of files already laid out under `root`
 */
export function createDirectorySnapshot(root: string, files: SnapshotFile[]): DirectorySnapshot {
  return describeFiles(files, (path) => createReadStream(resolveSnapshotPath(root, path)));
}

export async function readContent(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

async function collectFiles(root: string, dir: string, files: SnapshotFile[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectFiles(root, fullPath, files);
    } else if (entry.isFile()) {
      const [digest, stats] = await Promise.all([hashFile(fullPath), stat(fullPath)]);
      files.push({
        path: toPosixPath(relative(root, fullPath)),
        mode: stats.mode & 0o777,
        size: stats.size,
        sha256: digest,
      });
    }
    // Symlinks, sockets and devices are not cached
  }
}

/**
 * Describe every regular file under `dir`. A missing directory is an empty snapshot.
 */
export async function captureSnapshot(dir: string): Promise<DirectorySnapshot> {
  const files: SnapshotFile[] = [];
  try {
    await collectFiles(dir, dir, files);
  } catch (error) {
    if (!isMissing(error)) throw error;
  }
  return createDirectorySnapshot(dir, files);
}

/**
 * Stream one snapshot file to `target`, failing if the bytes written do not
 * hash to the recorded sha256
 */
export async function copySnapshotFile(
  snapshot: DirectorySnapshot,
  file: SnapshotFile,
  target: string
): Promise<void> {
  const hash = createHash('sha256');
  let size = 0;
  const verify = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      size += chunk.length;
      callback(null, chunk);
    },
  });

  await mkdir(dirname(target), { recursive: true });
  await pipeline(snapshot.openFile(file.path), verify, createWriteStream(target));
  await chmod(target, file.mode);

  if (size !== file.size || hash.digest('hex') !== file.sha256) {
    throw new Error(`File '${file.path}' does not match its recorded digest`);
  }
}

/**
 * Replace the contents of `dir` with the snapshot
 */
export async function applySnapshot(dir: string, snapshot: DirectorySnapshot): Promise<void> {
  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });

  for (const file of snapshot.files) {
    await copySnapshotFile(snapshot, file, resolveSnapshotPath(dir, file.path));
  }
}
