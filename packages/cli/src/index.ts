/**
 * @report-upload/cli
 *
 * Test-runner integration: option resolution, result statistics and the
 * best-effort post-run upload hook.
 */

export { main } from './main.js';

export {
  runUploadHook,
  buildRunMetadata,
  resolveLink,
  type HookClient,
  type UploadHookDeps,
  type UploadHookOutcome,
} from './hook.js';

export {
  parseArgs,
  resolveHookOptions,
  ENV_VARS,
  DEFAULT_HOOK_OPTIONS,
  type ParsedArgs,
  type UploadHookOptions,
} from './options.js';

export {
  collectResultStats,
  RESULT_STATUSES,
  type ResultStatus,
  type ResultStats,
} from './stats.js';

export { consoleSink, BufferedSink, formatSeparator, type ReportSink } from './sink.js';
