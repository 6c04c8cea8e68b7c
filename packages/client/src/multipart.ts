/**
 * multipart/form-data body encoding
 */

import { randomBytes } from 'node:crypto';

export interface MultipartPart {
  name: string;
  /** Omitted for plain fields; present for file parts */
  filename?: string;
  contentType?: string;
  content: Buffer | string;
}

export interface MultipartBody {
  boundary: string;
  /** Value for the request Content-Type header */
  contentType: string;
  body: Buffer;
}

const CRLF = '\r\n';

export function createBoundary(): string {
  return `----ReportUploadBoundary${randomBytes(12).toString('hex')}`;
}

/**
 * Encode parts into one multipart/form-data body, in the given order.
 */
export function encodeMultipart(parts: readonly MultipartPart[], boundary: string = createBoundary()): MultipartBody {
  const chunks: Buffer[] = [];

  for (const part of parts) {
    let head = `--${boundary}${CRLF}`;
    head += `Content-Disposition: form-data; name="${escapeQuoted(part.name)}"`;
    if (part.filename !== undefined) {
      head += `; filename="${escapeQuoted(part.filename)}"`;
    }
    head += CRLF;
    if (part.contentType) {
      head += `Content-Type: ${part.contentType}${CRLF}`;
    }
    head += CRLF;

    chunks.push(Buffer.from(head, 'utf-8'));
    chunks.push(typeof part.content === 'string' ? Buffer.from(part.content, 'utf-8') : part.content);
    chunks.push(Buffer.from(CRLF, 'utf-8'));
  }

  chunks.push(Buffer.from(`--${boundary}--${CRLF}`, 'utf-8'));

  return {
    boundary,
    contentType: `multipart/form-data; boundary=${boundary}`,
    body: Buffer.concat(chunks),
  };
}

// Same escaping browsers apply to form-data names and filenames
function escapeQuoted(value: string): string {
  return value.replace(/"/g, '%22').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}
