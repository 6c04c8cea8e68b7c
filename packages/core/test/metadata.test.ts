/**
 * Run Metadata Tests
 */

import { describe, it, expect } from 'vitest';
import {
  defaultMetadata,
  formatTimestamp,
  serializeMetadata,
} from '../src/utils/metadata.js';
import { staticEnvironment, firstDefined } from '../src/utils/environment.js';
import { SerializationError } from '../src/errors/index.js';
import type { RunMetadata } from '../src/types/index.js';

const START = new Date(Date.UTC(2024, 4, 1, 8, 30, 15, 987));

describe('defaultMetadata', () => {
  it('should fall back to local trigger and null branch/commit outside CI', () => {
    const meta = defaultMetadata(staticEnvironment({}, START));

    expect(meta).toEqual({
      trigger: 'local',
      branch: null,
      commit: null,
      started_at: '2024-05-01T08:30:15Z',
    });
  });

  it('should prefer GitLab variables over GitHub ones', () => {
    const meta = defaultMetadata(
      staticEnvironment(
        {
          CI_PIPELINE_SOURCE: 'merge_request_event',
          GITHUB_EVENT_NAME: 'push',
          CI_COMMIT_REF_NAME: 'feature/login',
          GITHUB_REF_NAME: 'main',
          CI_COMMIT_SHA: 'abc123',
          GITHUB_SHA: 'def456',
        },
        START,
      ),
    );

    expect(meta.trigger).toBe('merge_request_event');
    expect(meta.branch).toBe('feature/login');
    expect(meta.commit).toBe('abc123');
  });

  it('should use GitHub variables when GitLab ones are absent', () => {
    const meta = defaultMetadata(
      staticEnvironment({ GITHUB_EVENT_NAME: 'push', GITHUB_REF_NAME: 'main', GITHUB_SHA: 'def456' }, START),
    );

    expect(meta.trigger).toBe('push');
    expect(meta.branch).toBe('main');
    expect(meta.commit).toBe('def456');
  });

  it('should treat empty variables as unset', () => {
    const meta = defaultMetadata(staticEnvironment({ CI_PIPELINE_SOURCE: '', GITHUB_EVENT_NAME: 'schedule' }, START));
    expect(meta.trigger).toBe('schedule');
  });

  it('should keep field order stable', () => {
    const meta = defaultMetadata(staticEnvironment({}, START));
    expect(Object.keys(meta)).toEqual(['trigger', 'branch', 'commit', 'started_at']);
  });
});

describe('formatTimestamp', () => {
  it('should drop milliseconds', () => {
    expect(formatTimestamp(new Date(Date.UTC(1999, 11, 31, 23, 59, 59, 1)))).toBe('1999-12-31T23:59:59Z');
  });
});

describe('firstDefined', () => {
  it('should return undefined when no variable is set', () => {
    expect(firstDefined(staticEnvironment({}), ['A', 'B'])).toBeUndefined();
  });
});

describe('serializeMetadata', () => {
  it('should round-trip nested JSON values', () => {
    const meta: RunMetadata = {
      trigger: 'push',
      exit_status: 1,
      stats: { passed: 10, failed: 2 },
      tags: ['smoke', 'nightly'],
      flaky: false,
      commit: null,
    };

    const json = serializeMetadata(meta);
    expect(JSON.parse(json)).toEqual(meta);
    expect(json).toBe(
      '{"trigger":"push","exit_status":1,"stats":{"passed":10,"failed":2},"tags":["smoke","nightly"],"flaky":false,"commit":null}',
    );
  });

  it('should serialize an empty map', () => {
    expect(serializeMetadata({})).toBe('{}');
  });

  it('should reject non-finite numbers', () => {
    expect(() => serializeMetadata({ duration: Number.NaN })).toThrow(SerializationError);
    expect(() => serializeMetadata({ duration: Number.POSITIVE_INFINITY })).toThrow(
      'Metadata is not JSON-serializable: non-finite number Infinity at "duration"',
    );
  });

  it('should reject values outside the JSON model', () => {
    const withBigint: Record<string, unknown> = { size: 10n };
    const withFunction: Record<string, unknown> = { build: () => 'x' };

    expect(() => serializeMetadata(withBigint as RunMetadata)).toThrow('bigint value at "size"');
    expect(() => serializeMetadata(withFunction as RunMetadata)).toThrow('function value at "build"');
  });

  it('should wrap circular structures', () => {
    const node: Record<string, unknown> = {};
    node['self'] = node;

    try {
      serializeMetadata(node as RunMetadata);
      expect.fail('expected SerializationError');
    } catch (error) {
      expect(error).toBeInstanceOf(SerializationError);
      expect((error as SerializationError).code).toBe('SERIALIZATION_FAILED');
      expect((error as SerializationError).cause).toBeInstanceOf(TypeError);
    }
  });
});
