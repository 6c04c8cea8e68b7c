/**
 * Decoding of the service acknowledgment
 */

import { z } from 'zod';
import { MalformedResponseError, UNKNOWN_STATUS, type UploadResult } from '@report-upload/core';

const runIdSchema = z
  .union([
    z.number().int().nonnegative(),
    z
      .string()
      .regex(/^\d+$/, 'Expected a non-negative integer')
      .transform((value) => Number.parseInt(value, 10)),
  ])
  .refine(Number.isSafeInteger, 'Expected a run id no larger than 2^53 - 1');

/** Fields the service may return; null is treated like a missing field */
export const uploadResponseSchema = z.object({
  project: z.string().nullish(),
  run_id: runIdSchema.nullish(),
  ui_url: z.string().nullish(),
  latest_url: z.string().nullish(),
  status: z.string().nullish(),
  error: z.string().nullish(),
});

export type UploadResponseBody = z.infer<typeof uploadResponseSchema>;

/**
 * Parse a JSON response body into an UploadResult, applying defaults for
 * missing fields. `project` is the id that was submitted.
 */
export function parseUploadResponse(body: string, project: string): UploadResult {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new MalformedResponseError('body is not valid JSON', error);
  }

  const parsed = uploadResponseSchema.safeParse(data);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(reason, parsed.error);
  }

  const fields = parsed.data;
  const result: UploadResult = {
    project: fields.project ?? project,
    runId: fields.run_id ?? 0,
    uiUrl: fields.ui_url ?? '',
    latestUrl: fields.latest_url ?? '',
    status: fields.status ?? UNKNOWN_STATUS,
  };
  if (fields.error) {
    result.error = fields.error;
  }
  return result;
}
