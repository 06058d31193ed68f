import {
  DEFAULT_BASE_WAIT_MS,
  DEFAULT_FORBIDDEN_REASONS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RATE_LIMIT_REASONS,
  DefaultErrorClassifier,
} from '@discovery-engine/http-core';
import { CallBuilder, type CallBuilderConfig } from './CallBuilder';

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_RECURSION_DEPTH = 2;

export interface EngineEnvConfig {
  maxAttempts: number;
  baseWaitMs: number;
  timeoutMs: number;
  apiKey?: string;
  recursionDepth: number;
  rateLimitReasons: string[];
  forbiddenReasons: string[];
}

type Env = Record<string, string | undefined>;

/**
 * Reads engine settings from `DISCOVERY_*` environment variables, falling
 * back to the built-in defaults for anything unset or unparsable.
 */
export function readEngineConfig(env: Env = process.env): EngineEnvConfig {
  return {
    maxAttempts: parseNumberOrDefault(env.DISCOVERY_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    baseWaitMs: parseNumberOrDefault(env.DISCOVERY_RETRY_WAIT_MS, DEFAULT_BASE_WAIT_MS),
    timeoutMs: parseNumberOrDefault(env.DISCOVERY_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    apiKey: env.DISCOVERY_API_KEY || undefined,
    recursionDepth: parseNumberOrDefault(env.DISCOVERY_RECURSION_DEPTH, DEFAULT_RECURSION_DEPTH),
    rateLimitReasons: parseListOrDefault(env.DISCOVERY_RATE_LIMIT_REASONS, DEFAULT_RATE_LIMIT_REASONS),
    forbiddenReasons: parseListOrDefault(env.DISCOVERY_FORBIDDEN_REASONS, DEFAULT_FORBIDDEN_REASONS),
  };
}

/**
 * Factory function to create a call builder from environment variables
 *
 * @param configOverrides - Optional config overrides (credentials, transport, logger, ...)
 */
export function createCallBuilderFromEnv(configOverrides?: Partial<CallBuilderConfig>, env: Env = process.env): CallBuilder {
  const settings = readEngineConfig(env);

  return new CallBuilder({
    apiKey: settings.apiKey,
    timeoutMs: settings.timeoutMs,
    retry: { maxAttempts: settings.maxAttempts, baseWaitMs: settings.baseWaitMs },
    classifier: new DefaultErrorClassifier({
      rateLimitReasons: settings.rateLimitReasons,
      forbiddenReasons: settings.forbiddenReasons,
    }),
    ...configOverrides,
  });
}

export function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseListOrDefault(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return [...fallback];
  }
  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : [...fallback];
}
