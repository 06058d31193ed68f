import { HttpError, TimeoutError } from './errors';
import { noopLogger } from './logger';
import { fetchTransport } from './transport/fetchTransport';
import type {
  HttpClientConfig,
  HttpHeaders,
  HttpRequestInterceptor,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  Logger,
  QueryParams,
  TransportRequest,
} from './types';

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Single-attempt HTTP client. Every call is one round trip through the
 * transport; retry decisions belong to {@link executeWithRetry}, which wraps
 * calls made through this client.
 */
export class HttpClient {
  private readonly baseUrl?: string;
  private readonly clientName: string;
  private readonly defaultTimeoutMs: number;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly interceptors: HttpRequestInterceptor[];

  constructor(private readonly config: HttpClientConfig = {}) {
    this.baseUrl = this.normalizeBaseUrl(config.baseUrl);
    this.clientName = config.clientName ?? 'http-client';
    this.defaultTimeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger ?? noopLogger;
    this.interceptors = [...(config.interceptors ?? [])];
  }

  async requestJson<T>(opts: HttpRequestOptions): Promise<T> {
    const response = await this.requestJsonResponse<T>(opts);
    return response.body;
  }

  /**
   * Performs one request and decodes the JSON body. An empty body (204, or a
   * delete that returns nothing) decodes to an empty object.
   */
  async requestJsonResponse<T>(opts: HttpRequestOptions): Promise<HttpResponse<T>> {
    const response = await this.requestTextResponse(opts);
    const text = response.body.trim();
    const body: T = JSON.parse(text || '{}');
    return { ...response, body };
  }

  async requestText(opts: HttpRequestOptions): Promise<string> {
    const response = await this.requestTextResponse(opts);
    return response.body;
  }

  async requestTextResponse(opts: HttpRequestOptions): Promise<HttpResponse<string>> {
    const startedAt = Date.now();
    const controller = new AbortController();
    const request = await this.prepareRequest(opts, controller.signal);
    const url = this.buildUrl(request);
    const logMeta = { client: this.clientName, operation: request.operation, method: request.method, url };
    this.logger.debug('http.request.attempt', logMeta);

    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;
    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);

    const transportRequest: TransportRequest = {
      method: request.method,
      url,
      headers: request.headers ?? {},
      body: this.serializeBody(request),
    };

    try {
      const raw = await this.transport(transportRequest, controller.signal);
      const durationMs = Date.now() - startedAt;

      const accepted = request.acceptStatuses?.includes(raw.status) ?? false;
      if (!accepted && (raw.status < 200 || raw.status >= 300)) {
        this.logger.debug('http.request.failure', { ...logMeta, status: raw.status, durationMs });
        throw new HttpError(`HTTP ${raw.status} ${request.method} ${url}: ${raw.body}`, {
          status: raw.status,
          body: raw.body,
          headers: raw.headers,
          operation: request.operation,
        });
      }

      this.logger.debug('http.request.success', { ...logMeta, status: raw.status, durationMs });
      return { status: raw.status, headers: raw.headers, body: raw.body, durationMs };
    } catch (error) {
      const failure = didTimeout && !(error instanceof HttpError)
        ? new TimeoutError(`Request timed out after ${timeoutMs}ms: ${request.method} ${url}`)
        : error;
      await this.applyOnErrorInterceptors(request, failure);
      throw failure;
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private async prepareRequest(opts: HttpRequestOptions, signal: AbortSignal): Promise<HttpRequestOptions> {
    const request: HttpRequestOptions = {
      ...opts,
      headers: this.buildHeaders(opts),
      query: opts.query ? { ...opts.query } : undefined,
    };

    for (const interceptor of this.interceptors) {
      await interceptor.beforeSend?.({ request, signal });
    }
    return request;
  }

  private async applyOnErrorInterceptors(request: HttpRequestOptions, error: unknown): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      await interceptor.onError?.({ request, error });
    }
  }

  private buildHeaders(opts: HttpRequestOptions): HttpHeaders {
    const headers: HttpHeaders = { Accept: 'application/json' };
    if (opts.body !== undefined && opts.body !== null) {
      headers['Content-Type'] = 'application/json';
    }
    return { ...headers, ...this.config.defaultHeaders, ...opts.headers };
  }

  private serializeBody(request: HttpRequestOptions): string | Uint8Array | undefined {
    if (request.body === undefined || request.body === null) {
      return undefined;
    }
    if (typeof request.body === 'string' || request.body instanceof Uint8Array) {
      return request.body;
    }
    return JSON.stringify(request.body);
  }

  buildUrl(opts: HttpRequestOptions): string {
    if (opts.url) {
      const url = new URL(opts.url);
      this.applyQueryParameters(url, opts.query);
      return url.toString();
    }

    const urlParts = opts.urlParts ?? {};
    const path = urlParts.path ?? '';
    let url: URL;
    if (path && this.isAbsoluteUrl(path)) {
      url = new URL(path);
    } else {
      const base = this.normalizeBaseUrl(urlParts.baseUrl) ?? this.baseUrl;
      if (!base) {
        throw new Error('No baseUrl provided and request path is not an absolute URL');
      }
      const normalizedBase = base.endsWith('/') ? base : `${base}/`;
      const normalizedPath = path.startsWith('/') ? path.slice(1) : path;
      // './' keeps a leading 'name:verb' segment from parsing as a URL scheme
      url = new URL(`./${normalizedPath}`, normalizedBase);
    }

    this.applyQueryParameters(url, urlParts.query);
    this.applyQueryParameters(url, opts.query);
    return url.toString();
  }

  private applyQueryParameters(url: URL, query?: QueryParams) {
    if (!query) return;
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        for (const entry of value) {
          url.searchParams.append(key, String(entry));
        }
      } else {
        url.searchParams.set(key, String(value));
      }
    }
  }

  private isAbsoluteUrl(path: string): boolean {
    return /^[a-z][a-z0-9+.-]*:\/\//i.test(path);
  }

  private normalizeBaseUrl(value?: string): string | undefined {
    if (!value) {
      return undefined;
    }
    const trimmed = value.trim();
    if (!trimmed) {
      return undefined;
    }
    return trimmed.replace(/\/+$/, '') || trimmed;
  }
}
