/**
 * Sub-deadlines derived from a caller's AbortSignal.
 *
 * The derived signal aborts when the parent aborts (reason: TransportError
 * CANCELLED) or when the time budget runs out (reason: TransportError
 * DEADLINE_EXCEEDED). Callers must dispose() on every exit path.
 */

import { status as GrpcStatus } from "@grpc/grpc-js";
import { InvalidArgumentError, TransportError, describeError } from "./errors.js";

/** Largest delay a Node timer honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface SubDeadline {
  readonly signal: AbortSignal;
  readonly deadline: Date;
  dispose(): void;
}

/**
 * Validates a time budget. Anything but a positive finite number is an
 * InvalidArgumentError; budgets above MAX_TIMEOUT_MS are capped to it.
 */
export function checkTimeout(timeoutMs: number): number {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidArgumentError(
      "timeoutMs",
      `timeout must be a positive, finite number of milliseconds, got ${timeoutMs}`,
    );
  }
  return Math.min(timeoutMs, MAX_TIMEOUT_MS);
}

export function deriveDeadline(parent: AbortSignal | undefined, timeoutMs: number): SubDeadline {
  const budget = checkTimeout(timeoutMs);
  const controller = new AbortController();
  const deadline = new Date(Date.now() + budget);

  const onParentAbort = () => {
    controller.abort(cancelledBy(parent?.reason));
  };

  const timer = setTimeout(() => {
    controller.abort(
      new TransportError(GrpcStatus.DEADLINE_EXCEEDED, `deadline of ${budget}ms exceeded`),
    );
  }, budget);

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    deadline,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/** The error an aborted signal stands for, as a TransportError. */
export function abortError(signal: AbortSignal): TransportError {
  const reason: unknown = signal.reason;
  if (reason instanceof TransportError) return reason;
  return cancelledBy(reason);
}

function cancelledBy(reason: unknown): TransportError {
  const details = reason === undefined ? "cancelled by caller" : `cancelled by caller: ${describeError(reason)}`;
  return new TransportError(GrpcStatus.CANCELLED, details, { cause: reason });
}

/** Resolves after `ms`, or rejects with abortError(signal) as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
