/**
 * Hook options from command-line flags and environment variables
 */

import {
  InvalidConfigError,
  fileConfig,
  inlineConfig,
  processEnvironment,
  type ConfigPayload,
  type EnvironmentProvider,
  type RunMetadata,
} from '@report-upload/core';

export interface ParsedArgs {
  url?: string;
  project?: string;
  resultsDir?: string;
  timeout?: string;
  insecure: boolean;
  configFile?: string;
  configText?: string;
  headers: string[];
  meta: string[];
  exitStatus: number;
  envFile?: string;
  dryRun: boolean;
  help: boolean;
}

export interface UploadHookOptions {
  baseUrl: string;
  project: string;
  resultsDir: string;
  /** Request timeout (ms) */
  timeout: number;
  verifyTls: boolean;
  headers: Record<string, string>;
  config?: ConfigPayload;
  /** Entries merged over the default metadata */
  metadata: RunMetadata;
  /** Exit status of the test run being reported */
  exitStatus: number;
  /** List what would be uploaded instead of uploading */
  dryRun: boolean;
}

export const ENV_VARS = {
  url: 'ALLURE_UPLOAD_URL',
  project: 'ALLURE_UPLOAD_PROJECT',
  resultsDir: 'ALLURE_RESULTS_DIR',
  timeout: 'ALLURE_UPLOAD_TIMEOUT',
  insecure: 'ALLURE_UPLOAD_INSECURE',
  config: 'ALLURE_UPLOAD_CONFIG',
} as const;

export const DEFAULT_HOOK_OPTIONS = {
  resultsDir: 'allure-results',
  timeoutSeconds: 60,
} as const;

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    insecure: false,
    headers: [],
    meta: [],
    exitStatus: 0,
    dryRun: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const nextArg = args[i + 1];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;

      // Target
      case '--url':
        result.url = requireValue(arg, nextArg);
        i++;
        break;
      case '--project':
        result.project = requireValue(arg, nextArg);
        i++;
        break;
      case '--results-dir':
        result.resultsDir = requireValue(arg, nextArg);
        i++;
        break;

      // Transport
      case '--timeout':
        result.timeout = requireValue(arg, nextArg);
        i++;
        break;
      case '--insecure':
        result.insecure = true;
        break;
      case '--header':
        result.headers.push(requireValue(arg, nextArg));
        i++;
        break;

      // Payload
      case '--config':
        result.configFile = requireValue(arg, nextArg);
        i++;
        break;
      case '--config-text':
        result.configText = requireValue(arg, nextArg);
        i++;
        break;
      case '--meta':
        result.meta.push(requireValue(arg, nextArg));
        i++;
        break;

      // Hook
      case '--exit-status':
        result.exitStatus = parseExitStatus(requireValue(arg, nextArg));
        i++;
        break;
      case '--env-file':
        result.envFile = requireValue(arg, nextArg);
        i++;
        break;
      case '--dry-run':
        result.dryRun = true;
        break;

      default:
        throw new InvalidConfigError(arg, 'unknown option');
    }
  }

  return result;
}

/**
 * Combine flags with environment fallbacks. Flags win.
 */
export function resolveHookOptions(
  args: ParsedArgs,
  env: EnvironmentProvider = processEnvironment,
): UploadHookOptions {
  const configFile = args.configFile ?? env.get(ENV_VARS.config);
  if (args.configText !== undefined && configFile) {
    throw new InvalidConfigError('--config-text', 'cannot be combined with a config file');
  }

  let config: ConfigPayload | undefined;
  if (args.configText !== undefined) {
    config = inlineConfig(args.configText);
  } else if (configFile) {
    config = fileConfig(configFile);
  }

  return {
    baseUrl: (args.url ?? env.get(ENV_VARS.url) ?? '').trim(),
    project: (args.project ?? env.get(ENV_VARS.project) ?? '').trim(),
    resultsDir: (args.resultsDir ?? env.get(ENV_VARS.resultsDir) ?? '').trim() || DEFAULT_HOOK_OPTIONS.resultsDir,
    timeout: parseTimeoutSeconds(args.timeout ?? env.get(ENV_VARS.timeout)) * 1000,
    verifyTls: !(args.insecure || isTruthy(env.get(ENV_VARS.insecure))),
    headers: parseHeaders(args.headers),
    config,
    metadata: parseMetadataEntries(args.meta),
    exitStatus: args.exitStatus,
    dryRun: args.dryRun,
  };
}

const MAX_EXIT_STATUS = 255;

function requireValue(arg: string, value: string | undefined): string {
  if (value === undefined) {
    throw new InvalidConfigError(arg, 'missing value');
  }
  return value;
}

function parseTimeoutSeconds(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_HOOK_OPTIONS.timeoutSeconds;

  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidConfigError('--timeout', `expected a positive number of seconds, got "${raw}"`);
  }
  return seconds;
}

function parseExitStatus(raw: string): number {
  const status = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : NaN;
  if (!(status <= MAX_EXIT_STATUS)) {
    throw new InvalidConfigError('--exit-status', `expected an integer from 0 to ${MAX_EXIT_STATUS}, got "${raw}"`);
  }
  return status;
}

function parseHeaders(entries: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf(':');
    const name = entry.slice(0, separator).trim();
    if (separator <= 0 || !name) {
      throw new InvalidConfigError('--header', `expected "Name: value", got "${entry}"`);
    }
    headers[name] = entry.slice(separator + 1).trim();
  }
  return headers;
}

function parseMetadataEntries(entries: string[]): RunMetadata {
  const metadata: RunMetadata = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    const key = entry.slice(0, separator).trim();
    if (separator <= 0 || !key) {
      throw new InvalidConfigError('--meta', `expected "key=value", got "${entry}"`);
    }
    metadata[key] = entry.slice(separator + 1);
  }
  return metadata;
}

function isTruthy(value: string | undefined): boolean {
  return ['1', 'true', 'yes'].includes((value ?? '').trim().toLowerCase());
}
