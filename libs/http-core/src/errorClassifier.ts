import { HttpError, TimeoutError, TlsError, TransportError } from './errors';
import type {
  ClassifiedFailure,
  ClassifierContext,
  ErrorClassifier,
  ErrorClassifierConfig,
} from './types';

export const DEFAULT_RETRYABLE_STATUSES = [429, 500, 503];
export const DEFAULT_RATE_LIMIT_REASONS = ['rateLimitExceeded', 'userRateLimitExceeded'];
export const DEFAULT_FORBIDDEN_REASONS = ['forbidden', 'accountDisabled', 'insufficientPermissions'];
export const DEFAULT_RETRYABLE_TRANSPORT_CODES = [
  'ECONNRESET',
  'EPIPE',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
];

/**
 * Default classifier. Fails closed: anything it does not recognize is fatal.
 */
export class DefaultErrorClassifier implements ErrorClassifier {
  private readonly retryableStatuses: Set<number>;
  private readonly rateLimitReasons: Set<string>;
  private readonly forbiddenReasons: Set<string>;
  private readonly retryableTransportCodes: Set<string>;

  constructor(config: ErrorClassifierConfig = {}) {
    this.retryableStatuses = new Set(config.retryableStatuses ?? DEFAULT_RETRYABLE_STATUSES);
    this.rateLimitReasons = new Set(config.rateLimitReasons ?? DEFAULT_RATE_LIMIT_REASONS);
    this.forbiddenReasons = new Set(config.forbiddenReasons ?? DEFAULT_FORBIDDEN_REASONS);
    this.retryableTransportCodes = new Set(config.retryableTransportCodes ?? DEFAULT_RETRYABLE_TRANSPORT_CODES);
  }

  classify(error: unknown, ctx: ClassifierContext = {}): ClassifiedFailure {
    if (error instanceof HttpError) {
      return this.classifyHttpError(error, ctx);
    }

    if (error instanceof TimeoutError) {
      return { kind: 'retryable', reason: 'timeout' };
    }

    if (error instanceof TlsError) {
      return error.timedOut
        ? { kind: 'retryable', reason: 'tls_timeout' }
        : { kind: 'fatal', reason: `tls_error:${error.code}` };
    }

    if (error instanceof TransportError) {
      return this.retryableTransportCodes.has(error.code)
        ? { kind: 'retryable', reason: `transport:${error.code}` }
        : { kind: 'fatal', reason: `transport:${error.code}` };
    }

    return { kind: 'fatal', reason: 'unrecognized' };
  }

  private classifyHttpError(error: HttpError, ctx: ClassifierContext): ClassifiedFailure {
    const status = error.status;

    if (status === 409) {
      return ctx.creation
        ? { kind: 'benign_duplicate', reason: 'already_exists', statusCode: status }
        : { kind: 'fatal', reason: 'conflict', statusCode: status };
    }

    if (status === 403) {
      return this.classifyForbidden(error);
    }

    if (this.retryableStatuses.has(status)) {
      return { kind: 'retryable', reason: 'http_status', statusCode: status };
    }

    return { kind: 'fatal', reason: 'http_status', statusCode: status };
  }

  private classifyForbidden(error: HttpError): ClassifiedFailure {
    const body = error.errorBody;
    if (body?.status === 'PERMISSION_DENIED') {
      return { kind: 'fatal', reason: 'permission_denied', statusCode: 403 };
    }

    const reasons = body?.reasons ?? [];
    const forbidden = reasons.find((reason) => this.forbiddenReasons.has(reason));
    if (forbidden) {
      return { kind: 'fatal', reason: forbidden, statusCode: 403 };
    }

    const rateLimited = reasons.find((reason) => this.rateLimitReasons.has(reason));
    if (rateLimited) {
      return { kind: 'retryable', reason: rateLimited, statusCode: 403 };
    }

    return { kind: 'fatal', reason: reasons[0] ?? 'forbidden', statusCode: 403 };
  }
}

const defaultClassifier = new DefaultErrorClassifier();

export function classifyFailure(error: unknown, ctx?: ClassifierContext): ClassifiedFailure {
  return defaultClassifier.classify(error, ctx);
}
