import { TlsError, TransportError } from '../errors';
import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

const TLS_CODE_PATTERN = /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_|DEPTH_ZERO_|SELF_SIGNED_)/;

/**
 * fetch-based HTTP transport (Node 20 global fetch).
 * Socket and TLS failures reported by undici are rethrown as
 * TransportError / TlsError so the retry classifier can tell them apart.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  const init: RequestInit = {
    method: req.method,
    headers: req.headers,
    body: req.body,
    signal,
  };

  let response: Response;
  let body: string;
  try {
    response = await fetch(req.url, init);
    body = await response.text();
  } catch (error) {
    throw toTransportFailure(error);
  }

  // Convert Headers object to plain object
  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    headers,
    body,
  };
};

/**
 * Maps a low-level fetch failure to the engine's error types. Abort errors
 * pass through untouched so the client can turn them into timeouts.
 */
export function toTransportFailure(error: unknown): unknown {
  if (error instanceof Error && error.name === 'AbortError') {
    return error;
  }

  const code = findErrorCode(error);
  if (!code) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  if (TLS_CODE_PATTERN.test(code)) {
    return new TlsError(`TLS failure (${code}): ${message}`, code, {
      cause: error,
      timedOut: code === 'ERR_TLS_HANDSHAKE_TIMEOUT',
    });
  }
  return new TransportError(`Transport failure (${code}): ${message}`, code, { cause: error });
}

function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current; depth += 1) {
    if (typeof current !== 'object') return undefined;
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}
