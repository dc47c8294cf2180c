// CHANGE: Explicitly constructed pseudo-random source
// WHY: The generator is a value handed to the writer, so a fixed seed reproduces an exact sequence
// SOURCE: Mulberry32 (public domain)
// PURITY: CORE (state is local to each generator instance)
// INVARIANT: ∀ r = createSeededRandom(s): 0 ≤ r.next() ≤ r.maxValue
// COMPLEXITY: O(1) per draw

/**
 * Largest value a {@link RandomSource} returns (the classic 31-bit RAND_MAX).
 */
export const RANDOM_MAX = 0x7fff_ffff;

/**
 * Source of uniform non-negative integers.
 *
 * @invariant 0 ≤ next() ≤ maxValue
 */
export interface RandomSource {
	readonly maxValue: number;
	readonly next: () => number;
}

/**
 * Build a deterministic generator from a 32-bit seed.
 *
 * @param seed - Any finite number; only its low 32 bits are used
 * @returns Independent generator; two instances with the same seed yield the same sequence
 *
 * @pure false (each call to next() advances private state)
 * @complexity O(1)
 */
export function createSeededRandom(seed: number): RandomSource {
	let state = seed >>> 0;
	const nextUint32 = (): number => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return (t ^ (t >>> 14)) >>> 0;
	};
	return {
		maxValue: RANDOM_MAX,
		// Drop the low bit to land in [0, 2^31 - 1]
		next: () => nextUint32() >>> 1,
	};
}

/**
 * Seed derived from wall-clock seconds.
 *
 * @pure true
 * @example seedFromClock(1_700_000_000_123) === 1_700_000_000
 */
export const seedFromClock = (nowMillis: number): number =>
	Math.floor(nowMillis / 1000) >>> 0;
