export { reconcile, reconcileOrThrow, PollStatus, ReconcileState } from './Reconciler';
export type { PollResult, ReconcileOutcome, ReconcileRequest } from './Reconciler';
export { constantBackoff, exponentialBackoff, linearBackoff } from './backoff';
export type { BackoffStrategy } from './backoff';
export { MutationFailedError, PollFailedError, ReconcileError, ReconcileTimeoutError } from './errors';
export type { ReconcileErrorKind } from './errors';
