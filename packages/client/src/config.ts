/**
 * Upload Client Configuration
 */

import { InvalidArgumentError } from '@report-upload/core';

export interface UploaderClientOptions {
  /** Service root, e.g. https://reports.example.com */
  baseUrl: string;
  /** Wall-clock bound for one request including the response body (ms), default 60000 */
  timeout?: number;
  /** Verify the service TLS certificate, default true */
  verifyTls?: boolean;
  /** Headers sent with every request (auth tokens, tracing) */
  headers?: Record<string, string>;
  /** Multipart field carrying the JSON metadata, default "results-metadata" */
  metadataField?: string;
}

// ========== Wire format ==========

export const RESULTS_FIELD = 'results';
export const RESULTS_FILENAME = 'allure-results.zip';
export const CONFIG_FIELD = 'config';
export const INLINE_CONFIG_FILENAME = 'allure.config.mjs';

export const CONTENT_TYPES = {
  zip: 'application/zip',
  json: 'application/json',
  javascript: 'text/javascript',
} as const;

// ========== Defaults ==========

export const DEFAULT_CLIENT_OPTIONS = {
  timeout: 60000,
  verifyTls: true,
  metadataField: 'results-metadata',
} as const;

// ========== Resolved ==========

export interface ResolvedClientOptions {
  baseUrl: string;
  timeout: number;
  verifyTls: boolean;
  headers: Record<string, string>;
  metadataField: string;
}

export function resolveClientOptions(options: UploaderClientOptions): ResolvedClientOptions {
  const baseUrl = options.baseUrl.trim().replace(/\/+$/, '');
  if (!baseUrl) {
    throw new InvalidArgumentError('baseUrl', 'must not be empty');
  }

  const timeout = options.timeout ?? DEFAULT_CLIENT_OPTIONS.timeout;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('timeout', `must be a positive number of milliseconds, got ${timeout}`);
  }

  return {
    baseUrl,
    timeout,
    verifyTls: options.verifyTls ?? DEFAULT_CLIENT_OPTIONS.verifyTls,
    headers: { ...options.headers },
    metadataField: options.metadataField ?? DEFAULT_CLIENT_OPTIONS.metadataField,
  };
}
