import type { BeforeSendContext, CredentialProvider, HttpRequestInterceptor, Logger } from './types';

export interface CredentialInterceptorOptions {
  provider: CredentialProvider;
  /** Auth context used when a request does not name one. */
  defaultAuth?: string;
}

/**
 * Creates an interceptor that lets the request's credential authorize the
 * outgoing headers. The handle is fetched per attempt so a provider that
 * refreshes tokens is consulted on every retry.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({
 *   interceptors: [createCredentialInterceptor({ provider, defaultAuth: 'service' })],
 * });
 * ```
 */
export function createCredentialInterceptor(opts: CredentialInterceptorOptions): HttpRequestInterceptor {
  return {
    beforeSend: async (ctx: BeforeSendContext) => {
      const auth = ctx.request.auth ?? opts.defaultAuth;
      if (!auth) return;
      const credential = await opts.provider.getCredential(auth);
      ctx.request.headers = await credential.authorize({ ...ctx.request.headers });
    },
  };
}

export interface ApiKeyInterceptorOptions {
  apiKey: string;
  queryParam?: string; // default: "key"
}

/**
 * Appends an API key to the query string of every request that does not
 * already carry one.
 */
export function createApiKeyInterceptor(opts: ApiKeyInterceptorOptions): HttpRequestInterceptor {
  const queryParam = opts.queryParam ?? 'key';

  return {
    beforeSend: (ctx: BeforeSendContext) => {
      if (!ctx.request.query) {
        ctx.request.query = {};
      }
      if (ctx.request.query[queryParam] === undefined) {
        ctx.request.query[queryParam] = opts.apiKey;
      }
    },
  };
}

/**
 * Logs every failed attempt at debug level with the request's operation.
 */
export function createErrorLoggingInterceptor(logger: Logger): HttpRequestInterceptor {
  return {
    onError: ({ request, error }) => {
      logger.debug('http.request.error', {
        operation: request.operation,
        method: request.method,
        error: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
      });
    },
  };
}
