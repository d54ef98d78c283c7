import { performance } from 'node:perf_hooks';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  MutationFailedError,
  PollFailedError,
  type PollResult,
  PollStatus,
  reconcile,
  reconcileOrThrow,
  ReconcileState,
  ReconcileTimeoutError,
  linearBackoff,
} from '../src/index';

const pending = (observed?: string[]): PollResult<string[]> => ({ status: PollStatus.Pending, observed });
const completed = (observed?: string[]): PollResult<string[]> => ({ status: PollStatus.Completed, observed });

// fake timers move Date, not performance
const fakeNow = (): number => Date.now();

describe('reconcile', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fail without polling when the mutation fails', async () => {
    const mutate = vi.fn().mockRejectedValue(new Error('bind rejected'));
    const poll = vi.fn<[], Promise<PollResult<string[]>>>();

    const outcome = await reconcile({ mutate, poll, timeout: 10_000, now: fakeNow, minPollInterval: 2000, label: 'bind' });

    expect(outcome.state).toBe(ReconcileState.Failed);
    expect(outcome.error).toBeInstanceOf(MutationFailedError);
    expect(outcome.error?.message).toBe('bind: bind rejected');
    expect(outcome.attempts).toBe(0);
    expect(poll).not.toHaveBeenCalled();
  });

  it('should call the mutation exactly once before the first poll', async () => {
    const order: string[] = [];
    const mutate = vi.fn(async () => {
      order.push('mutate');
    });
    const poll = vi.fn(async () => {
      order.push('poll');
      return completed();
    });

    await reconcile({ mutate, poll, timeout: 1000, now: fakeNow, minPollInterval: 100 });

    expect(order).toEqual(['mutate', 'poll']);
  });

  it('should complete on the first poll without sleeping', async () => {
    const poll = vi.fn().mockResolvedValue(completed(['p1']));

    const outcome = await reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 10_000, now: fakeNow, minPollInterval: 2000 });

    expect(outcome).toEqual({ state: ReconcileState.Completed, elapsed: 0, attempts: 1, observed: ['p1'] });
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should complete after two pending polls at the minimum interval', async () => {
    const poll = vi.fn().mockResolvedValueOnce(pending()).mockResolvedValueOnce(pending()).mockResolvedValueOnce(completed());

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 10_000, now: fakeNow, minPollInterval: 2000 });
    await vi.advanceTimersByTimeAsync(4000);
    const outcome = await promise;

    expect(outcome.state).toBe(ReconcileState.Completed);
    expect(outcome.elapsed).toBe(4000);
    expect(poll).toHaveBeenCalledTimes(3);
  });

  it('should never poll sooner than the minimum interval', async () => {
    const poll = vi.fn().mockResolvedValueOnce(pending()).mockResolvedValueOnce(completed());

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 10_000, now: fakeNow, minPollInterval: 2000 });
    await vi.advanceTimersByTimeAsync(1999);
    expect(poll).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    const outcome = await promise;
    expect(poll).toHaveBeenCalledTimes(2);
    expect(outcome.elapsed).toBe(2000);
  });

  it('should time out when the predicate stays pending', async () => {
    const poll = vi.fn().mockResolvedValue(pending(['p1']));

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 5000, now: fakeNow, minPollInterval: 2000, label: 'bind' });
    await vi.advanceTimersByTimeAsync(5000);
    const outcome = await promise;

    expect(outcome.state).toBe(ReconcileState.TimedOut);
    expect(outcome.elapsed).toBe(5000);
    expect(outcome.attempts).toBe(3);
    expect(outcome.observed).toEqual(['p1']);
    expect(outcome.error).toBeInstanceOf(ReconcileTimeoutError);
    expect(outcome.error?.isTimeout).toBe(true);
  });

  it('should poll at least timeout / minPollInterval times before timing out', async () => {
    const poll = vi.fn().mockResolvedValue(pending());

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 10_000, now: fakeNow, minPollInterval: 2000 });
    await vi.advanceTimersByTimeAsync(10_000);
    const outcome = await promise;

    expect(outcome.state).toBe(ReconcileState.TimedOut);
    expect(poll).toHaveBeenCalledTimes(5);
  });

  it('should stop at the first poll error', async () => {
    const poll = vi.fn().mockResolvedValueOnce(pending()).mockResolvedValueOnce(pending()).mockRejectedValueOnce(new Error('list failed'));

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 10_000, now: fakeNow, minPollInterval: 2000, label: 'unbind' });
    await vi.advanceTimersByTimeAsync(4000);
    const outcome = await promise;

    expect(outcome.state).toBe(ReconcileState.Failed);
    expect(outcome.attempts).toBe(3);
    expect(outcome.error).toBeInstanceOf(PollFailedError);
    expect(outcome.error?.message).toBe('unbind: poll 3 failed: list failed');
    expect(poll).toHaveBeenCalledTimes(3);
  });

  it('should space polls by the backoff strategy', async () => {
    const poll = vi.fn().mockResolvedValueOnce(pending()).mockResolvedValueOnce(pending()).mockResolvedValueOnce(completed());

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 10_000, now: fakeNow, minPollInterval: 1000, backoff: linearBackoff });
    await vi.advanceTimersByTimeAsync(3000);
    const outcome = await promise;

    expect(outcome.elapsed).toBe(3000);
    expect(poll).toHaveBeenCalledTimes(3);
  });

  it('should clamp a backoff below the minimum interval', async () => {
    const poll = vi.fn().mockResolvedValueOnce(pending()).mockResolvedValueOnce(completed());

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 10_000, now: fakeNow, minPollInterval: 2000, backoff: () => 10 });
    await vi.advanceTimersByTimeAsync(2000);
    const outcome = await promise;

    expect(outcome.elapsed).toBe(2000);
  });

  it('should measure the budget with the monotonic clock by default', async () => {
    const clock = vi.spyOn(performance, 'now').mockReturnValue(1000);

    const outcome = await reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll: vi.fn().mockResolvedValue(completed()), timeout: 1000, minPollInterval: 100 });

    const reads = clock.mock.calls.length;
    clock.mockRestore();

    expect(reads).toBeGreaterThan(0);
    expect(outcome.elapsed).toBe(0);
  });

  it('should time out right after the clipped last sleep with a clock that steps back', async () => {
    let stepBack = 0;
    const clock = (): number => Date.now() - stepBack;
    const poll = vi.fn().mockResolvedValue(pending());

    const promise = reconcile({ mutate: vi.fn().mockResolvedValue(undefined), poll, timeout: 5000, now: clock, minPollInterval: 2000 });
    await vi.advanceTimersByTimeAsync(4500);
    stepBack = 50;
    await vi.advanceTimersByTimeAsync(500);
    const outcome = await promise;

    expect(outcome.state).toBe(ReconcileState.TimedOut);
    expect(outcome.elapsed).toBe(4950);
    expect(poll).toHaveBeenCalledTimes(3);
  });

  it('should reject invalid budgets', async () => {
    const mutate = vi.fn();

    await expect(reconcile({ mutate, poll: vi.fn(), timeout: 0, now: fakeNow, minPollInterval: 1000 })).rejects.toThrow('timeout must be greater than 0');
    await expect(reconcile({ mutate, poll: vi.fn(), timeout: 1000, now: fakeNow, minPollInterval: -1 })).rejects.toThrow('minPollInterval must be greater than 0');
    expect(mutate).not.toHaveBeenCalled();
  });
});

describe('reconcileOrThrow', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the outcome once completed', async () => {
    const outcome = await reconcileOrThrow({ mutate: vi.fn().mockResolvedValue(undefined), poll: vi.fn().mockResolvedValue(completed()), timeout: 1000, now: fakeNow, minPollInterval: 100 });

    expect(outcome.state).toBe(ReconcileState.Completed);
  });

  it('should throw the timeout error', async () => {
    const promise = reconcileOrThrow({ mutate: vi.fn().mockResolvedValue(undefined), poll: vi.fn().mockResolvedValue(pending()), timeout: 1000, now: fakeNow, minPollInterval: 500 });
    const assertion = expect(promise).rejects.toBeInstanceOf(ReconcileTimeoutError);

    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
  });

  it('should throw the mutation error with its cause', async () => {
    const cause = new Error('quota exceeded');

    await expect(reconcileOrThrow({ mutate: vi.fn().mockRejectedValue(cause), poll: vi.fn(), timeout: 1000, now: fakeNow, minPollInterval: 100 })).rejects.toMatchObject({
      kind: 'MutationFailed',
      cause,
    });
  });
});
