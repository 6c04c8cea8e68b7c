/**
 * @report-upload/archive
 *
 * ZIP archiving of test result directories.
 * Archives are built fully in memory before any upload starts.
 */

export {
  createArchiveBuffer,
  listRegularFiles,
  zipFiles,
  type ArchiveFile,
  type CreateArchiveOptions,
} from './archive-builder.js';

export { readArchiveEntries, type ArchiveEntry } from './archive-reader.js';
