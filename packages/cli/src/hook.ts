/**
 * Post-run upload hook
 *
 * Uploads the results of a finished test run and prints a summary.
 * Upload problems are reported, never raised: a failed upload must not
 * fail the run it describes.
 */

import * as fs from 'node:fs';
import { createArchiveBuffer, readArchiveEntries } from '@report-upload/archive';
import { UploaderClient, type UploaderClientOptions } from '@report-upload/client';
import {
  defaultMetadata,
  isUploaderError,
  processEnvironment,
  type ConfigPayload,
  type EnvironmentProvider,
  type RunMetadata,
  type UploadResult,
} from '@report-upload/core';
import type { UploadHookOptions } from './options.js';
import { consoleSink, type ReportSink } from './sink.js';
import { collectResultStats } from './stats.js';

/**
 * The part of UploaderClient the hook relies on
 */
export interface HookClient {
  upload(project: string, resultsDir: string, metadata?: RunMetadata, config?: ConfigPayload): Promise<UploadResult>;
  close(): Promise<void>;
}

export interface UploadHookDeps {
  sink?: ReportSink;
  environment?: EnvironmentProvider;
  createClient?: (options: UploaderClientOptions) => HookClient;
}

export type UploadHookOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'listed'; entries: string[] }
  | { status: 'uploaded'; result: UploadResult }
  | { status: 'failed'; error: Error };

const PREFIX = '[report-upload]';

export async function runUploadHook(
  options: UploadHookOptions,
  deps: UploadHookDeps = {},
): Promise<UploadHookOutcome> {
  const sink = deps.sink ?? consoleSink;
  const environment = deps.environment ?? processEnvironment;
  const createClient = deps.createClient ?? ((clientOptions) => new UploaderClient(clientOptions));

  if (!options.dryRun && (!options.baseUrl || !options.project)) {
    sink.writeLine(`${PREFIX} Missing URL or project`);
    return { status: 'skipped', reason: 'Missing URL or project' };
  }

  const isDirectory = await fs.promises
    .stat(options.resultsDir)
    .then((stats) => stats.isDirectory())
    .catch(() => false);
  if (!isDirectory) {
    sink.writeLine(`${PREFIX} Results dir not found: ${options.resultsDir}`);
    return { status: 'skipped', reason: `Results dir not found: ${options.resultsDir}` };
  }

  let client: HookClient | undefined;
  try {
    if (options.dryRun) {
      return await listArchive(options.resultsDir, sink);
    }

    const metadata = await buildRunMetadata(options, environment);
    client = createClient({
      baseUrl: options.baseUrl,
      timeout: options.timeout,
      verifyTls: options.verifyTls,
      headers: options.headers,
    });

    const result = await client.upload(options.project, options.resultsDir, metadata, options.config);
    reportResult(sink, options.baseUrl, result);
    return { status: 'uploaded', result };
  } catch (error) {
    sink.writeSeparator('Allure upload FAILED');
    sink.writeLine(error instanceof Error ? error.message : String(error));
    if (isUploaderError(error) && error.hint) {
      sink.writeLine(`hint: ${error.hint}`);
    }
    return { status: 'failed', error: error instanceof Error ? error : new Error(String(error)) };
  } finally {
    await client?.close().catch((error: unknown) => {
      console.warn(`[ReportUpload:Hook] Failed to release connections:`, error);
    });
  }
}

/**
 * Default metadata plus the run's exit status, result counts and extra entries
 */
export async function buildRunMetadata(
  options: UploadHookOptions,
  environment: EnvironmentProvider = processEnvironment,
): Promise<RunMetadata> {
  return {
    ...defaultMetadata(environment),
    exit_status: options.exitStatus,
    stats: await collectResultStats(options.resultsDir),
    ...options.metadata,
  };
}

/**
 * Absolute links pass through; relative ones are joined to the service URL.
 */
export function resolveLink(baseUrl: string, link: string): string {
  if (!link) return '';
  if (/^https?:\/\//i.test(link)) return link;

  const base = baseUrl.replace(/\/+$/, '');
  return link.startsWith('/') ? `${base}${link}` : `${base}/${link}`;
}

function reportResult(sink: ReportSink, baseUrl: string, result: UploadResult): void {
  sink.writeSeparator('Allure upload');
  sink.writeLine(`project: ${result.project}`);
  sink.writeLine(`run_id: ${result.runId}`);
  sink.writeLine(`status: ${result.status}`);
  sink.writeLine(`ui: ${resolveLink(baseUrl, result.uiUrl)}`);
  sink.writeLine(`latest: ${resolveLink(baseUrl, result.latestUrl)}`);
  if (result.error) {
    sink.writeLine(`error: ${result.error}`);
  }
}

async function listArchive(resultsDir: string, sink: ReportSink): Promise<UploadHookOutcome> {
  const archive = await createArchiveBuffer(resultsDir);
  const entries = await readArchiveEntries(archive);

  sink.writeSeparator('Allure upload (dry run)');
  for (const entry of entries) {
    sink.writeLine(`${entry.name} (${entry.size} bytes)`);
  }
  sink.writeLine(`${entries.length} files, ${archive.length} bytes compressed`);

  return { status: 'listed', entries: entries.map((entry) => entry.name) };
}
