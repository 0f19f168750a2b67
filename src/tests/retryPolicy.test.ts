import { exponentialBackoffPolicy, fixedRetryPolicy } from '../utils/retryPolicy.js';
import { formatDuration } from '../utils/timeUtils.js';

describe('retry policies', () => {
    it('waits the same delay between fixed attempts', () => {
        const policy = fixedRetryPolicy(3, 2000);
        expect(policy.maxAttempts).toBe(3);
        expect([0, 1, 2].map(attempt => policy.delayMs(attempt))).toEqual([2000, 2000, 2000]);
    });

    it('doubles the delay up to the cap', () => {
        const policy = exponentialBackoffPolicy(5, 1000, 5000);
        expect([0, 1, 2, 3].map(attempt => policy.delayMs(attempt))).toEqual([1000, 2000, 4000, 5000]);
    });

    it('always allows one attempt', () => {
        expect(fixedRetryPolicy(0, 10).maxAttempts).toBe(1);
    });
});

describe('formatDuration', () => {
    it.each([
        [1500, '1.5s'],
        [90_000, '1.5m'],
        [5_400_000, '1.5h']
    ])('formats %d ms as %s', (ms, expected) => {
        expect(formatDuration(ms)).toBe(expected);
    });
});
