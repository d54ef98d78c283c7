import debug from 'debug';
import { performance } from 'node:perf_hooks';

import type { BackoffStrategy } from './backoff';
import { constantBackoff } from './backoff';
import type { ReconcileError } from './errors';
import { MutationFailedError, PollFailedError, ReconcileTimeoutError } from './errors';

const debugReconciler = debug('skyform:reconciler');

export enum PollStatus {
  Pending = 'PENDING',
  Completed = 'COMPLETED',
}

export enum ReconcileState {
  Completed = 'COMPLETED',
  TimedOut = 'TIMED_OUT',
  Failed = 'FAILED',
}

export interface PollResult<T> {
  status: PollStatus;
  /** Whatever the read returned, kept as the last observed value */
  observed?: T;
}

export interface ReconcileRequest<T> {
  /** Called exactly once, before any poll */
  mutate: () => Promise<unknown>;
  /** A fresh read against the remote system; rejects on error */
  poll: () => Promise<PollResult<T>>;
  /** Budget for the polling phase, in milliseconds */
  timeout: number;
  minPollInterval: number;
  backoff?: BackoffStrategy;
  /** Prefix for error messages and debug output */
  label?: string;
  /** Monotonic clock in milliseconds; defaults to `performance.now` */
  now?: () => number;
}

export interface ReconcileOutcome<T> {
  state: ReconcileState;
  error?: ReconcileError;
  /** Milliseconds spent polling */
  elapsed: number;
  attempts: number;
  observed?: T;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const monotonicNow = (): number => performance.now();

/**
 * Performs one mutating call, then polls until the predicate reports completion,
 * a poll fails, or the timeout elapses. Never rejects for remote failures: they are
 * reported through the outcome.
 */
export async function reconcile<T>(request: ReconcileRequest<T>): Promise<ReconcileOutcome<T>> {
  const { mutate, poll, timeout, minPollInterval, backoff = constantBackoff, label = 'reconcile', now = monotonicNow } = request;

  if (!(timeout > 0)) throw new RangeError(`timeout must be greater than 0, got ${timeout}`);
  if (!(minPollInterval > 0)) throw new RangeError(`minPollInterval must be greater than 0, got ${minPollInterval}`);

  try {
    await mutate();
  } catch (error) {
    debugReconciler('%s: mutation failed: %O', label, error);
    return { state: ReconcileState.Failed, error: new MutationFailedError(label, error), elapsed: 0, attempts: 0 };
  }

  const startedAt = now();
  const deadline = startedAt + timeout;
  let attempts = 0;
  let observed: T | undefined;

  const timedOut = (): ReconcileOutcome<T> => {
    debugReconciler('%s: timed out after %d polls', label, attempts);
    return {
      state: ReconcileState.TimedOut,
      error: new ReconcileTimeoutError(label, timeout, attempts),
      elapsed: now() - startedAt,
      attempts,
      observed,
    };
  };

  for (;;) {
    attempts++;
    let result: PollResult<T>;
    try {
      result = await poll();
    } catch (error) {
      debugReconciler('%s: poll %d failed: %O', label, attempts, error);
      return { state: ReconcileState.Failed, error: new PollFailedError(label, attempts, error), elapsed: now() - startedAt, attempts, observed };
    }

    if (result.observed !== undefined) observed = result.observed;

    if (result.status === PollStatus.Completed) {
      debugReconciler('%s: completed after %d polls', label, attempts);
      return { state: ReconcileState.Completed, elapsed: now() - startedAt, attempts, observed };
    }

    const wait = Math.max(minPollInterval, backoff(attempts, minPollInterval));
    const remaining = deadline - now();

    // A sleep that reaches the deadline is the last one: no poll after it.
    if (remaining <= wait) {
      debugReconciler('%s: pending after poll %d, %dms left in the budget', label, attempts, Math.max(remaining, 0));
      if (remaining > 0) await sleep(remaining);
      return timedOut();
    }

    debugReconciler('%s: pending after poll %d, next poll in %dms', label, attempts, wait);
    await sleep(wait);
    if (now() >= deadline) return timedOut();
  }
}

/** Like `reconcile`, but throws the outcome's error unless the desired state was reached */
export async function reconcileOrThrow<T>(request: ReconcileRequest<T>): Promise<ReconcileOutcome<T>> {
  const outcome = await reconcile(request);
  if (outcome.state !== ReconcileState.Completed && outcome.error) throw outcome.error;

  return outcome;
}
