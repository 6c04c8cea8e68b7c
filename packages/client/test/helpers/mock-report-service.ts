/**
 * In-process stand-in for the report service.
 *
 * Records every request and answers with whatever the current handler returns.
 */

import * as http from 'node:http';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

export interface MockReply {
  status?: number;
  headers?: Record<string, string>;
  body?: string;
  /** Wait before answering (ms) */
  delayMs?: number;
}

export type MockHandler = (request: RecordedRequest) => MockReply;

export function jsonReply(body: unknown, status = 200): MockReply {
  return {
    status,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export class MockReportService {
  readonly requests: RecordedRequest[] = [];
  private server?: http.Server;
  private _baseUrl?: string;
  private handler: MockHandler = () => jsonReply({ status: 'ok' });

  get baseUrl(): string {
    if (!this._baseUrl) throw new Error('MockReportService not started');
    return this._baseUrl;
  }

  respondWith(handler: MockHandler): void {
    this.handler = handler;
  }

  async start(): Promise<void> {
    if (this.server) return;

    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((err) => {
        console.error('[MockReportService] Request error:', err);
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
    });
    this.server = server;

    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', () => {
        const addr = server.address();
        if (addr && typeof addr === 'object') {
          this._baseUrl = `http://127.0.0.1:${addr.port}`;
        }
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    this.server = undefined;
    this._baseUrl = undefined;
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }

    const recorded: RecordedRequest = {
      method: req.method ?? '',
      url: req.url ?? '',
      headers: req.headers,
      body: Buffer.concat(chunks),
    };
    this.requests.push(recorded);

    const reply = this.handler(recorded);
    if (reply.delayMs) {
      await new Promise((r) => setTimeout(r, reply.delayMs));
    }
    if (res.destroyed) return;

    res.writeHead(reply.status ?? 200, reply.headers ?? {});
    res.end(reply.body ?? '');
  }
}

/**
 * Decode a recorded multipart body with the WHATWG form-data parser.
 */
export function parseForm(request: RecordedRequest): Promise<FormData> {
  const contentType = request.headers['content-type'] ?? '';
  return new Response(request.body, { headers: { 'content-type': contentType } }).formData();
}

export type FilePart = Exclude<ReturnType<FormData['get']>, string | null>;

export function fileEntry(form: FormData, name: string): FilePart {
  const value = form.get(name);
  if (value === null || typeof value === 'string') {
    throw new Error(`Expected a file part named ${name}`);
  }
  return value;
}
