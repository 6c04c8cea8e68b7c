/**
 * @report-upload/core
 *
 * Result types, run metadata and error definitions shared by the uploader packages
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// Errors
export * from './errors/index.js';
