// CHANGE: Validate the three prompted integers before any file is touched
// WHY: Non-numeric tokens, a negative count or an inverted range would otherwise produce nonsense output
// PURITY: CORE
// EFFECT: Either<A, InvalidInput> (Either is a subtype of Effect, so APP can yield* it)
// INVARIANT: Right(req) ⇒ req.count ≥ 0 ∧ req.minimum ≤ req.maximum ∧ all values are 32-bit integers
// COMPLEXITY: O(|token|)

import { Either } from "effect";

import { InvalidInput, type RequestField } from "./errors.js";
import type { GenerationRequest } from "./models.js";

export const INT32_MIN = -0x8000_0000;
export const INT32_MAX = 0x7fff_ffff;

const INTEGER_TOKEN = /^[+-]?\d+$/u;

/**
 * Parse one whitespace-free token as a signed 32-bit integer.
 *
 * @param field - Prompted value the token answers (used in the error)
 * @param token - Raw token from the terminal
 * @returns Right(value) or Left(InvalidInput)
 *
 * @pure true
 * @complexity O(|token|)
 *
 * @example
 * ```ts
 * parseIntegerToken("count", "+7");  // Right(7)
 * parseIntegerToken("count", "7.5"); // Left(InvalidInput)
 * ```
 */
export function parseIntegerToken(
	field: RequestField,
	token: string,
): Either.Either<number, InvalidInput> {
	if (!INTEGER_TOKEN.test(token)) {
		return Either.left(
			new InvalidInput({
				field,
				reason: `expected an integer, got "${token}"`,
			}),
		);
	}
	// Normalise "-0" to 0
	const value = Number(token) + 0;
	if (value < INT32_MIN || value > INT32_MAX) {
		return Either.left(
			new InvalidInput({
				field,
				reason: `${token} is outside [${INT32_MIN}, ${INT32_MAX}]`,
			}),
		);
	}
	return Either.right(value);
}

/**
 * Check the cross-field constraints of a parsed request.
 *
 * @pure true
 * @postcondition Right(req) ⇒ req is returned unchanged
 */
export function validateRequest(
	request: GenerationRequest,
): Either.Either<GenerationRequest, InvalidInput> {
	if (request.count < 0) {
		return Either.left(
			new InvalidInput({
				field: "count",
				reason: `count must not be negative, got ${request.count}`,
			}),
		);
	}
	if (request.minimum > request.maximum) {
		return Either.left(
			new InvalidInput({
				field: "maximum",
				reason: `maximum (${request.maximum}) is less than minimum (${request.minimum})`,
			}),
		);
	}
	return Either.right(request);
}
