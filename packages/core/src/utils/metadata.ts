/**
 * Run metadata defaults and encoding
 */

import { SerializationError } from '../errors/index.js';
import type { RunMetadata } from '../types/metadata.js';
import { firstDefined, processEnvironment, type EnvironmentProvider } from './environment.js';

/** CI variables consulted for each default field, first match wins */
export const METADATA_SOURCES = {
  trigger: ['CI_PIPELINE_SOURCE', 'GITHUB_EVENT_NAME'],
  branch: ['CI_COMMIT_REF_NAME', 'GITHUB_REF_NAME'],
  commit: ['CI_COMMIT_SHA', 'GITHUB_SHA'],
} as const;

export const DEFAULT_TRIGGER = 'local';

/**
 * Format a date as ISO-8601 UTC with second precision, e.g. 2024-05-01T08:30:00Z
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Default metadata for a run: trigger source, branch, commit and start time.
 *
 * @example
 * defaultMetadata(staticEnvironment({ GITHUB_REF_NAME: 'main' }, new Date(0)))
 * // { trigger: 'local', branch: 'main', commit: null, started_at: '1970-01-01T00:00:00Z' }
 */
export function defaultMetadata(env: EnvironmentProvider = processEnvironment): RunMetadata {
  return {
    trigger: firstDefined(env, METADATA_SOURCES.trigger) ?? DEFAULT_TRIGGER,
    branch: firstDefined(env, METADATA_SOURCES.branch) ?? null,
    commit: firstDefined(env, METADATA_SOURCES.commit) ?? null,
    started_at: formatTimestamp(env.now()),
  };
}

/**
 * Encode metadata as a JSON document.
 * Throws SerializationError for values JSON cannot represent faithfully.
 */
export function serializeMetadata(metadata: RunMetadata): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(metadata, rejectNonJson);
  } catch (error) {
    if (error instanceof SerializationError) throw error;
    throw new SerializationError(error instanceof Error ? error.message : String(error), error);
  }

  if (json === undefined) {
    throw new SerializationError('metadata must be an object');
  }
  return json;
}

function rejectNonJson(key: string, value: unknown): unknown {
  const where = key ? `"${key}"` : 'the root';
  switch (typeof value) {
    case 'bigint':
      throw new SerializationError(`bigint value at ${where}`);
    case 'function':
    case 'symbol':
    case 'undefined':
      throw new SerializationError(`${typeof value} value at ${where}`);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new SerializationError(`non-finite number ${value} at ${where}`);
      }
      return value;
    default:
      return value;
  }
}
