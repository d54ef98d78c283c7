/**
 * Returns the wait before the next poll. `attempt` counts the pending polls observed so far (1-based).
 * The reconciler never waits less than `minPollInterval`, whatever a strategy returns.
 */
export type BackoffStrategy = (attempt: number, minPollInterval: number) => number;

export const constantBackoff: BackoffStrategy = (_attempt, minPollInterval) => minPollInterval;

export const linearBackoff: BackoffStrategy = (attempt, minPollInterval) => minPollInterval * attempt;

export function exponentialBackoff(maxPollInterval: number): BackoffStrategy {
  return (attempt, minPollInterval) => Math.min(minPollInterval * 2 ** (attempt - 1), Math.max(maxPollInterval, minPollInterval));
}
