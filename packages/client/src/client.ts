/**
 * HTTP client submitting result archives to the report service
 *
 * @example
 * ```typescript
 * import { UploaderClient } from '@report-upload/client';
 * import { defaultMetadata, inlineConfig } from '@report-upload/core';
 *
 * const client = new UploaderClient({ baseUrl: 'https://reports.example.com', timeout: 30000 });
 * try {
 *   const result = await client.upload('web-app', './allure-results', defaultMetadata(), inlineConfig('export default {}'));
 *   console.log(result.runId, result.uiUrl);
 * } finally {
 *   await client.close();
 * }
 * ```
 */

import { Agent, fetch } from 'undici';
import { createArchiveBuffer } from '@report-upload/archive';
import {
  HttpStatusError,
  InvalidArgumentError,
  TransportError,
  UnexpectedContentTypeError,
  serializeMetadata,
  type ConfigPayload,
  type RunMetadata,
  type UploadRequest,
  type UploadResult,
} from '@report-upload/core';
import {
  CONFIG_FIELD,
  CONTENT_TYPES,
  RESULTS_FIELD,
  RESULTS_FILENAME,
  resolveClientOptions,
  type ResolvedClientOptions,
  type UploaderClientOptions,
} from './config.js';
import { resolveConfigPart } from './config-part.js';
import { encodeMultipart, type MultipartBody, type MultipartPart } from './multipart.js';
import { parseUploadResponse } from './response.js';

/**
 * Status line, headers of interest and full body of one response
 */
interface ReceivedResponse {
  status: number;
  statusText: string;
  ok: boolean;
  contentType: string;
  body: string;
}

export class UploaderClient {
  private readonly options: ResolvedClientOptions;
  private readonly dispatcher: Agent;

  constructor(options: UploaderClientOptions) {
    this.options = resolveClientOptions(options);
    this.dispatcher = new Agent({
      connect: { rejectUnauthorized: this.options.verifyTls },
    });
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /**
   * Archive a results directory into an in-memory ZIP.
   */
  static archiveResults(resultsDir: string): Promise<Buffer> {
    return createArchiveBuffer(resultsDir);
  }

  /**
   * Endpoint receiving new runs of a project
   */
  runsUrl(project: string): string {
    return `${this.options.baseUrl}/api/v1/projects/${encodeURIComponent(project)}/runs`;
  }

  /**
   * Archive `resultsDir` and submit it as a new run of `project`.
   *
   * Resolves with the service acknowledgment, including when it reports an
   * `error`; callers inspect `status` and `error` themselves. Rejects with a
   * typed UploaderError for missing files, unserializable metadata, transport
   * failures and protocol violations. Nothing is retried.
   */
  async upload(
    project: string,
    resultsDir: string,
    metadata: RunMetadata = {},
    config?: ConfigPayload,
  ): Promise<UploadResult> {
    if (!project.trim()) {
      throw new InvalidArgumentError('project', 'must not be empty');
    }

    const archive = await UploaderClient.archiveResults(resultsDir);
    const metadataJson = serializeMetadata(metadata);
    const request: UploadRequest = {
      project,
      archive,
      metadata,
      config: await resolveConfigPart(config),
    };

    const url = this.runsUrl(request.project);
    const response = await this.send(url, this.encodeRequest(request, metadataJson));
    return this.interpret(response, url, request.project);
  }

  /**
   * Release pooled connections. The client must not be used afterwards.
   */
  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private encodeRequest(request: UploadRequest, metadataJson: string): MultipartBody {
    const parts: MultipartPart[] = [
      {
        name: RESULTS_FIELD,
        filename: RESULTS_FILENAME,
        contentType: CONTENT_TYPES.zip,
        content: request.archive,
      },
      {
        name: this.options.metadataField,
        contentType: CONTENT_TYPES.json,
        content: metadataJson,
      },
    ];

    if (request.config) {
      parts.push({
        name: CONFIG_FIELD,
        filename: request.config.filename,
        contentType: CONTENT_TYPES.javascript,
        content: request.config.content,
      });
    }

    return encodeMultipart(parts);
  }

  private async send(url: string, multipart: MultipartBody): Promise<ReceivedResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          ...withoutContentType(this.options.headers),
          'Content-Type': multipart.contentType,
        },
        body: multipart.body,
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });

      const body = await response.text();
      return {
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        contentType: response.headers.get('content-type') ?? '',
        body,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(
          `Upload to ${url} timed out after ${this.options.timeout}ms`,
          url,
          true,
          error,
        );
      }
      throw new TransportError(`Upload to ${url} failed: ${describeFailure(error)}`, url, false, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private interpret(response: ReceivedResponse, url: string, project: string): UploadResult {
    if (!response.contentType.toLowerCase().includes(CONTENT_TYPES.json)) {
      // A failing status wins over the content-type mismatch
      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText, url, response.body);
      }
      throw new UnexpectedContentTypeError(response.contentType, response.status);
    }

    return parseUploadResponse(response.body, project);
  }
}

function withoutContentType(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'content-type'),
  );
}

// fetch wraps socket-level failures as `TypeError: fetch failed` with the real error as cause
function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}
