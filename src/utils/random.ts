/** Random number generator with a fixed seed, for reproducible fixtures */
export interface RandomGenerator {
    next(): number; // [0, 1)
    nextInt(min: number, max: number): number; // [min, max]
    seed(value: number): void;
}

/** mulberry32: 32-bit state, period 2^32 */
export class SeededRandom implements RandomGenerator {
    private state = 0;

    constructor(seed: number) {
        this.seed(seed);
    }

    seed(value: number): void {
        this.state = value >>> 0;
    }

    next(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    nextInt(min: number, max: number): number {
        return min + Math.floor(this.next() * (max - min + 1));
    }
}
