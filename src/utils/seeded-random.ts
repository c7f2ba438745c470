import type { RandomSource } from '../uct-types.js';

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Mulberry32 generator. Same seed, same stream, which makes searches reproducible.
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function randomActionIndex(random: RandomSource, actionCount: number): number {
    return Math.floor(random() * actionCount);
}
