// CHANGE: Unit and property specs for range sampling and sequence generation
// WHY: Every emitted value must lie in [minimum, maximum] and the sequence must have exactly `count` values
// PURITY: CORE
// FORMAT THEOREM: sampleInRange(r, a, b) = a + r.next() mod (b - a + 1)

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { createSeededRandom, RANDOM_MAX } from "../../src/core/random.js";
import {
	formatLine,
	generateSequence,
	sampleInRange,
} from "../../src/core/sequence.js";
import { cyclicRandom } from "../utils/fakes.js";

describe("sampleInRange", () => {
	it("applies minimum + draw mod span", () => {
		expect(sampleInRange(cyclicRandom([17]), 1, 10)).toBe(8);
	});

	it("covers both ends of a range crossing zero", () => {
		const random = cyclicRandom([0, 10, 11, 5]);
		const values = [0, 1, 2, 3].map(() => sampleInRange(random, -5, 5));
		expect(values).toEqual([-5, 5, -5, 0]);
	});

	it("returns the single value when minimum equals maximum", () => {
		expect(sampleInRange(cyclicRandom([123456]), 7, 7)).toBe(7);
	});

	it("tops out at minimum + RANDOM_MAX for ranges wider than the generator", () => {
		expect(
			sampleInRange(cyclicRandom([RANDOM_MAX]), -2147483648, 2147483647),
		).toBe(-1);
	});

	it("stays within [minimum, maximum] for any seed and range", () => {
		fc.assert(
			fc.property(
				fc.integer(),
				fc.integer({ min: -1_000_000, max: 1_000_000 }),
				fc.integer({ min: 0, max: 1_000_000 }),
				(seed, minimum, width) => {
					const random = createSeededRandom(seed);
					const maximum = minimum + width;
					const value = sampleInRange(random, minimum, maximum);
					expect(value).toBeGreaterThanOrEqual(minimum);
					expect(value).toBeLessThanOrEqual(maximum);
				},
			),
		);
	});
});

describe("generateSequence", () => {
	it("yields exactly count values in draw order", () => {
		const values = Array.from(
			generateSequence(
				{ count: 4, minimum: 0, maximum: 9 },
				cyclicRandom([3, 14, 15, 92]),
			),
		);
		expect(values).toEqual([3, 4, 5, 2]);
	});

	it("yields nothing for count = 0", () => {
		const random = cyclicRandom([1]);
		const values = Array.from(
			generateSequence({ count: 0, minimum: 1, maximum: 10 }, random),
		);
		expect(values).toEqual([]);
		expect(random.calls()).toBe(0);
	});

	it("does not draw before iteration starts", () => {
		const random = cyclicRandom([1]);
		const sequence = generateSequence(
			{ count: 3, minimum: 1, maximum: 10 },
			random,
		);
		expect(random.calls()).toBe(0);
		expect(sequence.next().value).toBe(2);
		expect(random.calls()).toBe(1);
	});

	it("reproduces the same values for a fixed seed", () => {
		const request = { count: 4, minimum: 1, maximum: 10 };
		expect(
			Array.from(generateSequence(request, createSeededRandom(42))),
		).toEqual([9, 6, 3, 3]);
	});
});

describe("formatLine", () => {
	it("renders decimal integers with a trailing newline", () => {
		expect(formatLine(42)).toBe("42\n");
		expect(formatLine(-3)).toBe("-3\n");
		expect(formatLine(0)).toBe("0\n");
	});
});
