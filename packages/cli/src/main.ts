/**
 * report-upload command
 */

import { config as loadDotenv } from 'dotenv';
import { processEnvironment } from '@report-upload/core';
import { parseArgs, resolveHookOptions, type ParsedArgs, type UploadHookOptions } from './options.js';
import { runUploadHook, type UploadHookDeps } from './hook.js';
import { consoleSink } from './sink.js';

const PREFIX = '[report-upload]';

/**
 * Run the command and return the process exit code.
 * Upload failures do not change it: the code is the `--exit-status` passed in.
 */
export async function main(argv: string[], deps: UploadHookDeps = {}): Promise<number> {
  const sink = deps.sink ?? consoleSink;

  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    sink.writeLine(`${PREFIX} ${error instanceof Error ? error.message : String(error)}`);
    sink.writeLine(`${PREFIX} Run with --help for usage`);
    return 2;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  if (args.envFile) {
    const loaded = loadDotenv({ path: args.envFile });
    if (loaded.error) {
      console.warn(`[ReportUpload:Config] Env file not loaded: ${args.envFile}, using environment variables`);
    }
  }

  let options: UploadHookOptions;
  try {
    options = resolveHookOptions(args, deps.environment ?? processEnvironment);
  } catch (error) {
    sink.writeSeparator('Allure upload FAILED');
    sink.writeLine(error instanceof Error ? error.message : String(error));
    return args.exitStatus;
  }

  await runUploadHook(options, { ...deps, sink });
  return args.exitStatus;
}

function printHelp(): void {
  console.log(`
report-upload - Upload Allure results after a test run

Usage:
  report-upload [options]

Target:
  --url URL                  Report service URL (env: ALLURE_UPLOAD_URL)
  --project ID               Project id (env: ALLURE_UPLOAD_PROJECT)
  --results-dir PATH         Results directory (env: ALLURE_RESULTS_DIR, default: allure-results)

Transport:
  --timeout SECONDS          Request timeout (env: ALLURE_UPLOAD_TIMEOUT, default: 60)
  --insecure                 Skip TLS certificate verification (env: ALLURE_UPLOAD_INSECURE=1)
  --header "Name: value"     Extra request header, repeatable

Payload:
  --config PATH              Report config file (env: ALLURE_UPLOAD_CONFIG)
  --config-text JS           Inline report config
  --meta key=value           Extra metadata entry, repeatable

Hook:
  --exit-status N            Exit with this status whatever the upload outcome (default: 0)
  --env-file PATH            Load environment variables from a dotenv file first
  --dry-run                  List the archive contents without uploading

Other:
  --help, -h                 Show this help message

Examples:
  # Upload after a test run, keeping the run's exit status
  npx vitest run; report-upload --url https://reports.example.com --project web-app --exit-status $?

  # Settings from a dotenv file, with an auth header
  report-upload --env-file .env.ci --header "Authorization: Bearer $REPORT_TOKEN"
`);
}
