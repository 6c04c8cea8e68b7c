/**
 * @report-upload/client
 *
 * Submits archived test results and run metadata to the report service
 * as one multipart request, and decodes its acknowledgment.
 */

export { UploaderClient } from './client.js';

export {
  DEFAULT_CLIENT_OPTIONS,
  RESULTS_FIELD,
  RESULTS_FILENAME,
  CONFIG_FIELD,
  INLINE_CONFIG_FILENAME,
  CONTENT_TYPES,
  resolveClientOptions,
  type UploaderClientOptions,
  type ResolvedClientOptions,
} from './config.js';

export { resolveConfigPart } from './config-part.js';
export { encodeMultipart, createBoundary, type MultipartPart, type MultipartBody } from './multipart.js';
export { parseUploadResponse, uploadResponseSchema, type UploadResponseBody } from './response.js';
