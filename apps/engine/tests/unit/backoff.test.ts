import { calculateBackOff } from '../../src/utils/backoff';

describe('calculateBackOff', () => {
    it('returns ~2000ms for attempt 1 (default)', () => {
        const delay = calculateBackOff(1);
        expect(delay).toBeGreaterThanOrEqual(1800);
        expect(delay).toBeLessThanOrEqual(2200);
    });

    it('returns ~4000ms for attempt 2 (default multiplier 2)', () => {
        const delay = calculateBackOff(2);
        expect(delay).toBeGreaterThanOrEqual(3600);
        expect(delay).toBeLessThanOrEqual(4400);
    });

    it('caps at maxInterval', () => {
        const delay = calculateBackOff(10, 1000, 4, 5000);
        expect(delay).toBeGreaterThanOrEqual(4500); // 5000 ± 10% jitter
        expect(delay).toBeLessThanOrEqual(5500);
    });

    it('is exact when jitter is disabled', () => {
        expect(calculateBackOff(3, 100, 3, 10_000, 0)).toBe(900);
    });
});
