/**
 * Reads entries back out of an in-memory ZIP.
 */

import * as yauzl from 'yauzl-promise';

export interface ArchiveEntry {
  name: string;
  size: number;
  content: Buffer;
}

/**
 * List file entries of a ZIP buffer with their decompressed contents.
 * Directory entries are skipped.
 */
export async function readArchiveEntries(archive: Buffer): Promise<ArchiveEntry[]> {
  const zip = await yauzl.fromBuffer(archive);
  const entries: ArchiveEntry[] = [];

  try {
    for await (const entry of zip) {
      if (entry.filename.endsWith('/')) continue;

      const readStream = await entry.openReadStream();
      const chunks: Buffer[] = [];
      for await (const chunk of readStream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }

      entries.push({
        name: entry.filename,
        size: entry.uncompressedSize,
        content: Buffer.concat(chunks),
      });
    }
  } finally {
    await zip.close();
  }

  return entries;
}
