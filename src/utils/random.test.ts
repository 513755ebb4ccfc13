import { describe, expect, it } from 'vitest';

import { SeededRandom } from './random';

describe('SeededRandom', () => {
    it('should repeat the same sequence for the same seed', () => {
        const a = new SeededRandom(64);
        const b = new SeededRandom(64);

        const seqA = Array.from({ length: 20 }, () => a.next());
        const seqB = Array.from({ length: 20 }, () => b.next());

        expect(seqA).toEqual(seqB);
    });

    it('should restart the sequence when reseeded', () => {
        const rng = new SeededRandom(7);
        const first = rng.next();
        rng.next();

        rng.seed(7);

        expect(rng.next()).toBe(first);
    });

    it('should keep values in range', () => {
        const rng = new SeededRandom(1);

        for (let i = 0; i < 1000; ++i) {
            const value = rng.next();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);

            const int = rng.nextInt(450, 455);
            expect(Number.isInteger(int)).toBe(true);
            expect(int).toBeGreaterThanOrEqual(450);
            expect(int).toBeLessThanOrEqual(455);
        }
    });
});
