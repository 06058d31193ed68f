export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | QueryValue[] | undefined>;

export interface UrlParts {
  baseUrl?: string;   // e.g. "https://widgets.example.com/v1/"
  path?: string;      // e.g. "projects/p-1/widgets"
  query?: QueryParams;
}

export type LoggerMeta = Record<string, unknown> & {
  operation?: string;
  auth?: string;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Outcome of classifying a failed remote call.
 *
 * - 'retryable': rate limiting, transient 5xx, socket resets, TLS timeouts
 * - 'fatal': authorization, malformed calls, anything unrecognized
 * - 'benign_duplicate': a creation call hit an object that already exists
 */
export type FailureClass = 'retryable' | 'fatal' | 'benign_duplicate';

export interface ClassifiedFailure {
  kind: FailureClass;
  reason: string;
  statusCode?: number;
}

export interface ClassifierContext {
  /** True when the call creates a remote object (409 then means "already done"). */
  creation?: boolean;
  operation?: string;
}

export interface ErrorClassifier {
  classify(error: unknown, ctx?: ClassifierContext): ClassifiedFailure;
}

export interface ErrorClassifierConfig {
  retryableStatuses?: number[];       // Default: [429, 500, 503]
  /** 403 reasons that mean "slow down", retried like a 429. */
  rateLimitReasons?: string[];        // Default: ['rateLimitExceeded', 'userRateLimitExceeded']
  /** 403 reasons that are always fatal, whatever the rate-limit list says. */
  forbiddenReasons?: string[];        // Default: ['forbidden', 'accountDisabled', 'insufficientPermissions']
  retryableTransportCodes?: string[];
}

export interface RetryProfile {
  maxAttempts?: number;   // Default: 3
  baseWaitMs?: number;    // Default: 31_000, doubled after each retryable failure
}

/**
 * Transport layer request.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string | Uint8Array;
}

/**
 * Transport layer raw HTTP response.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: string;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 * Socket and TLS failures must surface as TransportError / TlsError.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * Opaque credential attached to outbound calls. The engine only ever asks it
 * to authorize a header set.
 */
export interface CredentialHandle {
  authorize(headers: HttpHeaders): HttpHeaders | Promise<HttpHeaders>;
}

export interface CredentialProvider {
  getCredential(auth: string): Promise<CredentialHandle> | CredentialHandle;
  /** Stable identifier of the credential behind `auth`, used in cache keys. */
  fingerprint?(auth: string): string;
}

export interface HttpRequestOptions {
  method: HttpMethod;

  url?: string;
  urlParts?: UrlParts;  // exactly one of url or urlParts must be provided

  headers?: HttpHeaders;
  query?: QueryParams;

  body?: unknown;       // JSON encoded unless already a string or bytes

  /** Statuses outside 2xx that are returned instead of raised, e.g. 308 for upload chunks. */
  acceptStatuses?: number[];

  operation?: string;

  /** Auth context name handed to the credential interceptor. */
  auth?: string;

  /** Per-attempt timeout; falls back to the client default. */
  timeoutMs?: number;
}

export interface HttpResponse<TBody = unknown> {
  status: number;
  headers: HttpHeaders;
  body: TBody;
  durationMs: number;
}

export interface BeforeSendContext {
  request: HttpRequestOptions;
  signal: AbortSignal;
}

export interface OnErrorContext {
  request: HttpRequestOptions;
  error: unknown;
}

/**
 * Request interceptor for cross-cutting concerns.
 *
 * `beforeSend` hooks run in registration order and may mutate the request
 * (headers, query). `onError` hooks run in reverse registration order and
 * cannot suppress the error. Interceptors run once per attempt and must not
 * retry on their own.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;

  onError?(ctx: OnErrorContext): Promise<void> | void;
}

export interface HttpClientConfig {
  baseUrl?: string;
  transport?: HttpTransport;
  defaultHeaders?: HttpHeaders;
  interceptors?: HttpRequestInterceptor[];
  logger?: Logger;
  timeoutMs?: number;   // Default: 60_000
  clientName?: string;
}
