export type ReconcileErrorKind = 'MutationFailed' | 'PollFailed' | 'TimedOut';

export class ReconcileError extends Error {
  constructor(
    readonly kind: ReconcileErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReconcileError';
  }

  get isTimeout(): boolean {
    return this.kind === 'TimedOut';
  }
}

/** The side-effecting call itself failed; no polling took place */
export class MutationFailedError extends ReconcileError {
  constructor(label: string, cause: unknown) {
    super('MutationFailed', `${label}: ${describeCause(cause)}`, { cause });
    this.name = 'MutationFailedError';
  }
}

export class PollFailedError extends ReconcileError {
  constructor(
    label: string,
    readonly attempt: number,
    cause: unknown
  ) {
    super('PollFailed', `${label}: poll ${attempt} failed: ${describeCause(cause)}`, { cause });
    this.name = 'PollFailedError';
  }
}

/** The desired state was never observed within the budget; the remote operation may still be in progress */
export class ReconcileTimeoutError extends ReconcileError {
  constructor(
    label: string,
    readonly timeout: number,
    readonly attempts: number
  ) {
    super('TimedOut', `${label}: desired state not observed after ${timeout}ms (${attempts} polls), the operation may still be in progress`);
    this.name = 'ReconcileTimeoutError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
