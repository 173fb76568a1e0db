/** Source of uniformly distributed floats in [0, 1). */
export interface RandomSource {
    next: () => number;
}

export const mathRandom: RandomSource = {
    next: () => Math.random()
};

/**
 * Xorshift32 generator. Same seed, same sequence: used for reproducible
 * obstacle patterns in tests and replays.
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        // Zero is a fixed point of xorshift
        this.state = (seed >>> 0) || 0xdeadbeef;
    }

    nextUint32(): number {
        let x = this.state;
        x ^= x << 13;
        x ^= x >>> 17;
        x ^= x << 5;
        this.state = x >>> 0;
        return this.state;
    }

    next(): number {
        return this.nextUint32() / 0x100000000;
    }

    getState(): number {
        return this.state;
    }
}

/** Fisher-Yates shuffle into a new array; draws `items.length - 1` values. */
export const shuffle = <T>(items: readonly T[], rng: RandomSource): T[] => {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(rng.next() * (i + 1));
        const held = result[i];
        result[i] = result[j];
        result[j] = held;
    }
    return result;
};

export const coinFlip = (rng: RandomSource): boolean => rng.next() < 0.5;
