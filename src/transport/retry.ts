/**
 * Declarative retry for unary calls.
 *
 * The policy is plain data, in the shape of a gRPC service-config
 * retryPolicy; invokeWithRetry is the only code that interprets it.
 */

import { status as GrpcStatus } from "@grpc/grpc-js";
import { abortError, sleep } from "../deadline.js";
import { TransportError, statusName } from "../errors.js";
import type { Logger } from "../logger.js";

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  readonly maxAttempts: number;
  readonly initialBackoffMs: number;
  readonly maxBackoffMs: number;
  readonly backoffMultiplier: number;
  readonly retryableStatusCodes: readonly GrpcStatus[];
}

export const DEFAULT_SIGN_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  initialBackoffMs: 100,
  maxBackoffMs: 1_000,
  backoffMultiplier: 2,
  retryableStatusCodes: Object.freeze([GrpcStatus.UNAVAILABLE, GrpcStatus.DEADLINE_EXCEEDED]),
});

/** Waits between consecutive attempts, e.g. [100, 200] for the default policy. */
export function backoffSchedule(policy: RetryPolicy): number[] {
  const delays: number[] = [];
  let backoff = policy.initialBackoffMs;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    delays.push(Math.min(backoff, policy.maxBackoffMs));
    backoff *= policy.backoffMultiplier;
  }
  return delays;
}

export function isRetryable(policy: RetryPolicy, err: unknown): err is TransportError {
  return err instanceof TransportError && policy.retryableStatusCodes.includes(err.code);
}

/**
 * Runs `attempt` until it resolves, fails with a non-retryable error, runs
 * out of attempts, or `signal` aborts. Aborting also interrupts a pending
 * backoff.
 */
export async function invokeWithRetry<T>(
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<T>,
  signal?: AbortSignal,
  logger?: Logger,
): Promise<T> {
  const delays = backoffSchedule(policy);

  for (let attemptNumber = 1; ; attemptNumber++) {
    if (signal?.aborted) throw abortError(signal);

    try {
      return await attempt(attemptNumber);
    } catch (err) {
      if (signal?.aborted) throw abortError(signal);
      if (attemptNumber >= policy.maxAttempts || !isRetryable(policy, err)) throw err;

      const delay = delays[attemptNumber - 1];
      logger?.warn(
        `Attempt ${attemptNumber}/${policy.maxAttempts} failed with ${statusName(err.code)}, retrying in ${delay}ms`,
      );
      await sleep(delay, signal);
    }
  }
}
