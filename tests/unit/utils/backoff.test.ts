import { backoffDelay, parseRetryAfter } from '../../../src/utils/backoff';

describe('backoff', () => {
  it('doubles the delay per attempt up to the cap', () => {
    expect([0, 1, 2].map((a) => backoffDelay(a))).toEqual([1000, 2000, 4000]);
    expect(backoffDelay(10)).toBe(30_000);
  });

  it('parses Retry-After seconds and dates', () => {
    const now = Date.parse('2026-01-01T00:00:00.000Z');
    expect(parseRetryAfter('3', now)).toBe(3000);
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:05 GMT', now)).toBe(5000);
    expect(parseRetryAfter('soon', now)).toBeUndefined();
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
  });
});
