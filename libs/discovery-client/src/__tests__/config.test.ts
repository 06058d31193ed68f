import { describe, expect, it, vi } from 'vitest';
import { HttpError, noopLogger, type RawHttpResponse, type TransportRequest } from '@discovery-engine/http-core';
import { createCallBuilderFromEnv, parseListOrDefault, parseNumberOrDefault, readEngineConfig } from '../config';
import { json, widgetsDocumentText } from './fixtures';

describe('readEngineConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(readEngineConfig({})).toEqual({
      maxAttempts: 3,
      baseWaitMs: 31_000,
      timeoutMs: 60_000,
      apiKey: undefined,
      recursionDepth: 2,
      rateLimitReasons: ['rateLimitExceeded', 'userRateLimitExceeded'],
      forbiddenReasons: ['forbidden', 'accountDisabled', 'insufficientPermissions'],
    });
  });

  it('reads every DISCOVERY_* variable', () => {
    const config = readEngineConfig({
      DISCOVERY_MAX_ATTEMPTS: '5',
      DISCOVERY_RETRY_WAIT_MS: '100',
      DISCOVERY_TIMEOUT_MS: '2500',
      DISCOVERY_API_KEY: 'test-key',
      DISCOVERY_RECURSION_DEPTH: '4',
      DISCOVERY_RATE_LIMIT_REASONS: ' quotaExceeded , rateLimitExceeded ',
      DISCOVERY_FORBIDDEN_REASONS: 'forbidden',
    });

    expect(config).toEqual({
      maxAttempts: 5,
      baseWaitMs: 100,
      timeoutMs: 2500,
      apiKey: 'test-key',
      recursionDepth: 4,
      rateLimitReasons: ['quotaExceeded', 'rateLimitExceeded'],
      forbiddenReasons: ['forbidden'],
    });
  });
});

describe('parse helpers', () => {
  it('falls back on unparsable numbers', () => {
    expect(parseNumberOrDefault('abc', 7)).toBe(7);
    expect(parseNumberOrDefault(undefined, 7)).toBe(7);
    expect(parseNumberOrDefault('0', 7)).toBe(0);
  });

  it('falls back on empty lists', () => {
    expect(parseListOrDefault(' , ', ['a'])).toEqual(['a']);
  });
});

describe('createCallBuilderFromEnv', () => {
  it('applies the retry settings and API key from the environment', async () => {
    const transport = vi.fn<[TransportRequest, AbortSignal], Promise<RawHttpResponse>>(async (request) =>
      request.url.includes('$discovery')
        ? json(JSON.parse(widgetsDocumentText))
        : { status: 403, headers: {}, body: '{"error":{"code":403,"errors":[{"reason":"quotaExceeded"}]}}' },
    );
    const sleep = vi.fn().mockResolvedValue(undefined);
    const calls = createCallBuilderFromEnv(
      {
        transport,
        sleep,
        logger: noopLogger,
        urlTemplates: ['https://{service}.example.test/$discovery/rest?version={version}'],
      },
      {
        DISCOVERY_MAX_ATTEMPTS: '2',
        DISCOVERY_RETRY_WAIT_MS: '10',
        DISCOVERY_API_KEY: 'test-key',
        DISCOVERY_RATE_LIMIT_REASONS: 'quotaExceeded',
      },
    );

    await expect(
      calls.execute({ service: 'widgets', version: 'v1', method: 'projects.widgets.get', args: { name: 'w' } }),
    ).rejects.toBeInstanceOf(HttpError);

    const serviceUrls = transport.mock.calls.map(([request]) => request.url).filter((url) => !url.includes('$discovery'));
    expect(serviceUrls).toEqual(['https://widgets.example.test/v1/w?key=test-key', 'https://widgets.example.test/v1/w?key=test-key']);
    expect(sleep.mock.calls).toEqual([[10]]);
  });
});
