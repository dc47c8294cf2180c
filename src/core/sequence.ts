// CHANGE: Range sampling and sequence generation for the output artifact
// WHY: Keep the arithmetic pure so the file writer only moves bytes
// PURITY: CORE
// FORMAT THEOREM: ∀ v ∈ generateSequence(req, r): req.minimum ≤ v ≤ req.maximum
// INVARIANT: |generateSequence(req, r)| = req.count
// COMPLEXITY: O(count) time, O(1) space (lazy)

import type { GenerationRequest } from "./models.js";
import type { RandomSource } from "./random.js";

/**
 * Draw one value from [minimum, maximum].
 *
 * Uses `minimum + next() mod (maximum - minimum + 1)`, so ranges that do not
 * divide RANDOM_MAX + 1 evenly carry the usual modulo bias. Ranges wider than
 * RANDOM_MAX + 1 only ever produce values in [minimum, minimum + RANDOM_MAX].
 *
 * @precondition minimum ≤ maximum
 * @complexity O(1)
 */
export function sampleInRange(
	random: RandomSource,
	minimum: number,
	maximum: number,
): number {
	const span = maximum - minimum + 1;
	return minimum + (random.next() % span);
}

/**
 * Lazily yield `request.count` samples.
 *
 * Nothing is drawn until the consumer starts iterating.
 */
export function* generateSequence(
	request: GenerationRequest,
	random: RandomSource,
): Generator<number, void, undefined> {
	for (let i = 0; i < request.count; i += 1) {
		yield sampleInRange(random, request.minimum, request.maximum);
	}
}

/**
 * Render one value as a newline-terminated decimal line.
 *
 * @example formatLine(-3) === "-3\n"
 */
export const formatLine = (value: number): string => `${value}\n`;
