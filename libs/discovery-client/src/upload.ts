import {
  DefaultErrorClassifier,
  executeWithRetry,
  isRecord,
  noopLogger,
  type HttpClient,
  type HttpHeaders,
  type HttpRequestOptions,
  type HttpResponse,
  type Logger,
  type RetryOptions,
  type RetryProfile,
} from '@discovery-engine/http-core';
import { BadArgumentError, UploadError } from './errors';
import { expandPath, type BoundCall } from './requestBuilder';

export const UPLOAD_RETRYABLE_STATUSES = [500, 502, 503, 504];
export const DEFAULT_UPLOAD_MAX_ATTEMPTS = 6;
export const DEFAULT_UPLOAD_BASE_WAIT_MS = 61_000;
/** Chunk sizes must be multiples of 256 KiB, except for the last chunk. */
export const DEFAULT_UPLOAD_CHUNK_SIZE = 32 * 256 * 1024;

const RESUME_INCOMPLETE = 308;

export interface MediaBody {
  data: Uint8Array;
  contentType: string;
}

export interface UploadOptions extends RetryProfile {
  chunkSize?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export type UploadResult = Record<string, unknown> & { id: unknown };

const uploadClassifier = new DefaultErrorClassifier({ retryableStatuses: UPLOAD_RETRYABLE_STATUSES });

/**
 * Sends `media` through the resumable upload protocol of the bound method:
 * one POST opens a session carrying the bound body as metadata, then the
 * bytes go up in chunks until the service answers with the created object.
 */
export async function uploadMedia(
  http: HttpClient,
  bound: BoundCall,
  media: MediaBody,
  options: UploadOptions = {},
): Promise<UploadResult> {
  const { method, document, dotPath } = bound.resolved;
  const path = method.mediaUpload?.protocols?.resumable?.path;
  if (!method.supportsMediaUpload || path === undefined) {
    throw new BadArgumentError('media', 'this method does not accept uploads', `"${dotPath}" has no resumable upload path.`);
  }

  const chunkSize = options.chunkSize ?? DEFAULT_UPLOAD_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new BadArgumentError('chunkSize', `${chunkSize} is not a positive whole number`, 'Pass a multiple of 262144.');
  }

  const logger = options.logger ?? noopLogger;
  const operation = bound.request.operation;
  const retry: RetryOptions & { creation?: false } = {
    maxAttempts: options.maxAttempts ?? DEFAULT_UPLOAD_MAX_ATTEMPTS,
    baseWaitMs: options.baseWaitMs ?? DEFAULT_UPLOAD_BASE_WAIT_MS,
    classifier: uploadClassifier,
    sleep: options.sleep,
    logger,
    operation,
  };
  const total = media.data.byteLength;

  const session = await executeWithRetry(
    () =>
      http.requestTextResponse({
        ...bound.request,
        urlParts: { baseUrl: document.rootUrl, path: expandPath(path, bound.args) },
        query: { ...bound.request.query, uploadType: 'resumable' },
        headers: {
          ...bound.request.headers,
          'X-Upload-Content-Type': media.contentType,
          'X-Upload-Content-Length': String(total),
        },
      }),
    retry,
  );
  const sessionUrl = findHeader(session.headers, 'location');
  if (sessionUrl === undefined) {
    throw new UploadError('The upload session was not started: the response has no Location header', operation);
  }

  let offset = 0;
  for (;;) {
    const end = Math.min(offset + chunkSize, total);
    const chunk: HttpRequestOptions = {
      method: 'PUT',
      url: sessionUrl,
      headers: { 'Content-Type': media.contentType, 'Content-Range': contentRange(offset, end, total) },
      body: media.data.subarray(offset, end),
      acceptStatuses: [RESUME_INCOMPLETE],
      operation,
      auth: bound.request.auth,
      timeoutMs: bound.request.timeoutMs,
    };
    const response = await executeWithRetry(() => http.requestTextResponse(chunk), retry);

    if (response.status !== RESUME_INCOMPLETE) {
      return finishUpload(response, operation, total, logger);
    }

    const next = persistedOffset(findHeader(response.headers, 'range'));
    logger.debug('discovery.upload.chunk', { operation, uploaded: next, total });
    if (next <= offset && end > offset) {
      throw new UploadError(`The upload stalled at byte ${offset} of ${total}`, operation);
    }
    offset = next;
  }
}

function finishUpload(response: HttpResponse<string>, operation: string | undefined, total: number, logger: Logger): UploadResult {
  const text = response.body.trim();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text || '{}');
  } catch (error) {
    throw new UploadError(`The upload failed with an unexpected response: ${text}`, operation, { cause: error });
  }
  if (!isRecord(parsed) || parsed.id === undefined) {
    throw new UploadError(`The upload failed with an unexpected response: ${text}`, operation);
  }
  logger.info('discovery.upload.done', { operation, id: String(parsed.id), bytes: total });
  return { ...parsed, id: parsed.id };
}

function contentRange(start: number, end: number, total: number): string {
  return end > start ? `bytes ${start}-${end - 1}/${total}` : `bytes */${total}`;
}

/** Offset after a `Range: bytes=0-N` header; no header means nothing was kept. */
function persistedOffset(range: string | undefined): number {
  const match = range === undefined ? null : /^bytes=0-(\d+)$/.exec(range.trim());
  return match ? Number(match[1]) + 1 : 0;
}

function findHeader(headers: HttpHeaders, name: string): string | undefined {
  const key = Object.keys(headers).find((candidate) => candidate.toLowerCase() === name);
  return key === undefined ? undefined : headers[key];
}
