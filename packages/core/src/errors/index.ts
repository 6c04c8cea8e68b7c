/**
 * Report Upload Error Codes
 */
export const ErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  SERIALIZATION_FAILED: 'SERIALIZATION_FAILED',
  TRANSPORT_FAILED: 'TRANSPORT_FAILED',
  HTTP_STATUS: 'HTTP_STATUS',
  UNEXPECTED_CONTENT_TYPE: 'UNEXPECTED_CONTENT_TYPE',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export interface UploaderErrorOptions {
  hint?: string;
  cause?: unknown;
}

/**
 * Base class for upload errors
 */
export class UploaderError extends Error {
  public readonly hint?: string;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    options: UploaderErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UploaderError';
    this.hint = options.hint;
  }

  toErrorMessage() {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

export function isUploaderError(error: unknown): error is UploaderError {
  return error instanceof UploaderError;
}

/**
 * Error: Results directory or config file missing, or not the expected kind
 */
export class NotFoundError extends UploaderError {
  constructor(
    public readonly path: string,
    public readonly expected: 'directory' | 'file',
    what: string,
  ) {
    super(ErrorCodes.NOT_FOUND, `${what} not found: ${path}`, {
      hint: `Verify that ${path} exists and is a ${expected}`,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error: Run metadata cannot be encoded as JSON
 */
export class SerializationError extends UploaderError {
  constructor(reason: string, cause?: unknown) {
    super(ErrorCodes.SERIALIZATION_FAILED, `Metadata is not JSON-serializable: ${reason}`, {
      hint: 'Metadata values must be strings, finite numbers, booleans, null, arrays or plain objects',
      cause,
    });
    this.name = 'SerializationError';
  }
}

/**
 * Error: Request never produced a response (DNS, connection, TLS, timeout)
 */
export class TransportError extends UploaderError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut: boolean,
    cause?: unknown,
  ) {
    super(ErrorCodes.TRANSPORT_FAILED, message, {
      hint: timedOut ? 'Increase the upload timeout or check the service load' : 'Check the service URL and network access',
      cause,
    });
    this.name = 'TransportError';
  }
}

/** Longest body excerpt quoted in an HttpStatusError message */
export const MAX_BODY_EXCERPT = 500;

/**
 * Error: Service answered with a failure status and a non-JSON body.
 * The message quotes at most MAX_BODY_EXCERPT characters; `body` keeps all of it.
 */
export class HttpStatusError extends UploaderError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
    public readonly body: string,
  ) {
    super(
      ErrorCodes.HTTP_STATUS,
      `Upload failed: ${status}${statusText ? ` ${statusText}` : ''} for url: ${url}${body ? ` - ${excerpt(body)}` : ''}`,
    );
    this.name = 'HttpStatusError';
  }
}

function excerpt(body: string): string {
  if (body.length <= MAX_BODY_EXCERPT) return body;
  return `${body.slice(0, MAX_BODY_EXCERPT)}... (${body.length - MAX_BODY_EXCERPT} more characters)`;
}

/**
 * Error: Service answered with a success status but not with JSON
 */
export class UnexpectedContentTypeError extends UploaderError {
  constructor(
    public readonly contentType: string,
    public readonly status: number,
  ) {
    super(ErrorCodes.UNEXPECTED_CONTENT_TYPE, `Unexpected response content-type: ${contentType}`, {
      hint: 'The URL may point at a proxy or web page instead of the report service API',
    });
    this.name = 'UnexpectedContentTypeError';
  }
}

/**
 * Error: Body claimed to be JSON but could not be decoded into a result
 */
export class MalformedResponseError extends UploaderError {
  constructor(reason: string, cause?: unknown) {
    super(ErrorCodes.MALFORMED_RESPONSE, `Malformed upload response: ${reason}`, { cause });
    this.name = 'MalformedResponseError';
  }
}

export class InvalidArgumentError extends UploaderError {
  constructor(
    public readonly argument: string,
    reason: string,
  ) {
    super(ErrorCodes.INVALID_ARGUMENT, `Invalid ${argument}: ${reason}`);
    this.name = 'InvalidArgumentError';
  }
}

export class InvalidConfigError extends UploaderError {
  constructor(
    public readonly option: string,
    reason: string,
  ) {
    super(ErrorCodes.INVALID_CONFIG, `Invalid option ${option}: ${reason}`);
    this.name = 'InvalidConfigError';
  }
}
