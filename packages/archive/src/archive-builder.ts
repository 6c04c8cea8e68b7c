/**
 * Builds in-memory ZIP archives from result directories.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import archiver from 'archiver';
import { NotFoundError } from '@report-upload/core';

export interface ArchiveFile {
  /** Absolute path on disk */
  sourcePath: string;
  /** Entry name inside the archive, always '/'-separated */
  entryName: string;
}

export interface CreateArchiveOptions {
  /** zlib compression level, default 6 */
  level?: number;
}

/**
 * Archive every regular file under `sourceDir` into a ZIP held in memory.
 *
 * Entry names are paths relative to `sourceDir` with forward slashes.
 * Directories, symbolic links and special files are not recorded.
 * The whole archive is buffered, so very large directories cost
 * proportional memory.
 */
export async function createArchiveBuffer(
  sourceDir: string,
  options: CreateArchiveOptions = {},
): Promise<Buffer> {
  await assertDirectory(sourceDir);
  const files = await listRegularFiles(sourceDir);

  return zipFiles(files, options);
}

/**
 * Write the given files into a ZIP held in memory, in the order given.
 * Rejects when a file cannot be read, including one removed after listing.
 */
export async function zipFiles(
  files: ArchiveFile[],
  options: CreateArchiveOptions = {},
): Promise<Buffer> {
  const archive = archiver('zip', { zlib: { level: options.level ?? 6 } });
  const chunks: Buffer[] = [];

  const finished = new Promise<void>((resolve, reject) => {
    archive.on('data', (chunk: Buffer) => chunks.push(chunk));
    archive.on('end', () => resolve());
    archive.on('error', reject);
    archive.on('warning', reject);
  });

  for (const file of files) {
    archive.file(file.sourcePath, { name: file.entryName });
  }
  // A failed entry can reject either promise first
  await Promise.all([finished, archive.finalize()]);

  return Buffer.concat(chunks);
}

/**
 * Recursively collect regular files under `rootDir`, sorted by entry name.
 */
export async function listRegularFiles(rootDir: string): Promise<ArchiveFile[]> {
  const root = path.resolve(rootDir);
  const files: ArchiveFile[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const sourcePath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(sourcePath);
      } else if (entry.isFile()) {
        files.push({
          sourcePath,
          entryName: path.relative(root, sourcePath).split(path.sep).join('/'),
        });
      }
    }
  }

  await walk(root);
  return files.sort((a, b) => (a.entryName < b.entryName ? -1 : a.entryName > b.entryName ? 1 : 0));
}

async function assertDirectory(dir: string): Promise<void> {
  const stats = await fs.promises.stat(dir).catch(() => undefined);
  if (!stats?.isDirectory()) {
    throw new NotFoundError(dir, 'directory', 'Results directory');
  }
}
