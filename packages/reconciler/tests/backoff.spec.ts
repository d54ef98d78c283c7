import { describe, expect, it } from 'vitest';

import { constantBackoff, exponentialBackoff, linearBackoff } from '../src/index';

describe('backoff strategies', () => {
  it('constant should always wait the minimum interval', () => {
    expect([1, 2, 5].map((attempt) => constantBackoff(attempt, 2000))).toEqual([2000, 2000, 2000]);
  });

  it('linear should grow by the minimum interval', () => {
    expect([1, 2, 3].map((attempt) => linearBackoff(attempt, 2000))).toEqual([2000, 4000, 6000]);
  });

  it('exponential should double up to the cap', () => {
    const backoff = exponentialBackoff(10_000);

    expect([1, 2, 3, 4, 5].map((attempt) => backoff(attempt, 2000))).toEqual([2000, 4000, 8000, 10_000, 10_000]);
  });

  it('exponential should never cap below the minimum interval', () => {
    expect(exponentialBackoff(500)(3, 2000)).toBe(2000);
  });
});
