import type { RunMetadata } from './metadata.js';

/**
 * A config payload after it has been read and named
 */
export interface ResolvedConfigPart {
  filename: string;
  content: Buffer;
}

/**
 * Everything one upload submits. Built per call and never persisted.
 */
export interface UploadRequest {
  project: string;
  archive: Buffer;
  metadata: RunMetadata;
  config?: ResolvedConfigPart;
}
