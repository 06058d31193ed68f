import { setTimeout as delay } from 'timers/promises';
import { DefaultErrorClassifier } from './errorClassifier';
import { noopLogger } from './logger';
import type { ErrorClassifier, Logger, RetryProfile } from './types';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_WAIT_MS = 31_000;

const NO_OP_BRAND: unique symbol = Symbol('discovery-engine.no-op');

/**
 * Returned instead of a result when a creation call finds the object already
 * exists. Callers treat it as "already satisfied".
 */
export interface NoOp {
  readonly [NO_OP_BRAND]: true;
  readonly reason: 'already_exists';
}

export const NO_OP: NoOp = Object.freeze({ [NO_OP_BRAND]: true as const, reason: 'already_exists' as const });

export function isNoOp(value: unknown): value is NoOp {
  return typeof value === 'object' && value !== null && NO_OP_BRAND in value;
}

export interface RetryOptions extends RetryProfile {
  /** Marks creation calls so a 409 resolves to NO_OP instead of failing. */
  creation?: boolean;
  operation?: string;
  classifier?: ErrorClassifier;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

const defaultClassifier = new DefaultErrorClassifier();

/**
 * Runs `attempt` with exponential backoff.
 *
 * CAUTION: the total wait must stay below the validity window of the
 * credential used by the call. With the defaults (3 attempts, 31s base) the
 * worst case is 31s + 62s of sleep.
 */
export function executeWithRetry<T>(
  attempt: () => Promise<T>,
  options: RetryOptions & { creation: true },
): Promise<T | NoOp>;
export function executeWithRetry<T>(
  attempt: () => Promise<T>,
  options?: RetryOptions & { creation?: false },
): Promise<T>;
export function executeWithRetry<T>(attempt: () => Promise<T>, options?: RetryOptions): Promise<T | NoOp>;
export async function executeWithRetry<T>(
  attempt: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T | NoOp> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const classifier = options.classifier ?? defaultClassifier;
  const logger = options.logger ?? noopLogger;
  const sleep = options.sleep ?? defaultSleep;
  let waitMs = options.baseWaitMs ?? DEFAULT_BASE_WAIT_MS;

  for (let attemptNumber = 1; ; attemptNumber += 1) {
    try {
      return await attempt();
    } catch (error) {
      const classified = classifier.classify(error, {
        creation: options.creation,
        operation: options.operation,
      });

      // only creation calls may resolve to NO_OP
      if (classified.kind === 'benign_duplicate' && options.creation) {
        logger.info('retry.already_exists', {
          operation: options.operation,
          statusCode: classified.statusCode,
        });
        return NO_OP;
      }

      const remainingAttempts = maxAttempts - attemptNumber;
      if (classified.kind !== 'retryable' || remainingAttempts <= 0) {
        logger.error('retry.give_up', {
          operation: options.operation,
          reason: classified.reason,
          attempts: attemptNumber,
          error: describeError(error),
        });
        throw error;
      }

      logger.warn('retry.wait', {
        operation: options.operation,
        reason: classified.reason,
        remainingAttempts,
        waitMs,
        error: describeError(error),
      });
      await sleep(waitMs);
      waitMs *= 2;
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
