/**
 * Seeded shuffling of the execution order
 */

export type RandomSource = () => number;

/**
 * Pick a fresh 32-bit seed
 */
export function randomSeed(): number {
    return Math.floor(Math.random() * 0x100000000) >>> 0;
}

/**
 * mulberry32: small, fast PRNG with a 32-bit state.
 * Returns floats in [0, 1); the same seed always yields the same sequence.
 */
export function createRandomSource(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6D2B79F5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
    };
}

/**
 * Fisher-Yates shuffle into a new array; the input is left untouched
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
    const result = [...items];
    for(let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}
