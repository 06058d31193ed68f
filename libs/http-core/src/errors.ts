import type { HttpHeaders } from './types';

/**
 * Non-2xx response from a remote service. The raw body is kept verbatim so
 * operators see exactly what the service said.
 */
export class HttpError extends Error {
  status: number;
  body: string;
  errorBody?: RemoteErrorBody;
  headers?: HttpHeaders;
  operation?: string;

  constructor(
    message: string,
    options: {
      status: number;
      body?: string;
      headers?: HttpHeaders;
      operation?: string;
    },
  ) {
    super(message);
    this.name = 'HttpError';
    this.status = options.status;
    this.body = options.body ?? '';
    this.headers = options.headers;
    this.operation = options.operation;
    this.errorBody = parseRemoteErrorBody(this.body);
  }
}

/**
 * Socket-level failure (reset, refused, incomplete read, cannot send).
 */
export class TransportError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
  }
}

/**
 * Failure in the TLS layer. Only handshake timeouts are worth retrying.
 */
export class TlsError extends Error {
  readonly code: string;
  readonly timedOut: boolean;

  constructor(message: string, code: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = 'TlsError';
    this.code = code;
    this.timedOut = options?.timedOut ?? /timed? ?out/i.test(message);
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Structured error envelope most discovery-described services return:
 * `{ "error": { "code": 403, "status": "PERMISSION_DENIED", "errors": [{ "reason": "forbidden" }] } }`
 */
export interface RemoteErrorBody {
  code?: number;
  status?: string;
  message?: string;
  reasons: string[];
}

export function parseRemoteErrorBody(text: string): RemoteErrorBody | undefined {
  if (!text) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed) || !isRecord(parsed.error)) {
    return undefined;
  }
  const error = parsed.error;
  const reasons: string[] = [];
  if (Array.isArray(error.errors)) {
    for (const entry of error.errors) {
      if (isRecord(entry) && typeof entry.reason === 'string') {
        reasons.push(entry.reason);
      }
    }
  }
  if (Array.isArray(error.details)) {
    for (const detail of error.details) {
      if (isRecord(detail) && typeof detail.reason === 'string') {
        reasons.push(detail.reason);
      }
    }
  }
  return {
    code: typeof error.code === 'number' ? error.code : undefined,
    status: typeof error.status === 'string' ? error.status : undefined,
    message: typeof error.message === 'string' ? error.message : undefined,
    reasons,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
