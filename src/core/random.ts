// src/core/random.ts

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

const DEFAULT_SEED = 2463534242;

/**
 * Deterministic xorshift32 source. A zero seed would lock the generator at
 * zero, so it falls back to the default seed.
 */
export function createSeededRandom(seed: number): RandomSource {
	let state = seed >>> 0 || DEFAULT_SEED;
	return () => {
		let x = state;
		x ^= x << 13;
		x >>>= 0;
		x ^= x >>> 17;
		x ^= x << 5;
		x >>>= 0;
		state = x;
		// top 24 bits → [0, 1)
		return (x >>> 8) / 0x01000000;
	};
}

export const DEFAULT_LEVEL_FACTOR = 1 / Math.LN2;

/**
 * Draws the top layer of a new node: floor(-ln(u) * levelFactor) with
 * u in (0, 1], clamped to maxLevel. Higher layers get exponentially fewer
 * nodes.
 */
export class LevelGenerator {
	constructor(
		private readonly maxLevel: number,
		private readonly random: RandomSource = Math.random,
		private readonly levelFactor: number = DEFAULT_LEVEL_FACTOR,
	) {}

	next(): number {
		const u = 1 - this.random();
		// max(0, …) folds the -0 produced by u === 1
		const level = Math.max(0, Math.floor(-Math.log(u) * this.levelFactor));
		return Math.min(level, this.maxLevel);
	}
}
