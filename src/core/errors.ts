// CHANGE: Typed domain error ADT for the generator using Effect.Data
// WHY: Failures travel in the Effect error channel instead of as thrown exceptions
// REF: Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Which prompted value an input error refers to.
 */
export type RequestField = "count" | "minimum" | "maximum";

/**
 * Output file could not be opened for writing.
 *
 * @pure true (Data class)
 * @invariant path.length > 0
 * @complexity O(1)
 */
export class OutputUnavailable extends Data.TaggedError("OutputUnavailable")<{
	readonly path: string;
	readonly code: string;
}> {}

/**
 * A write failed after the file was opened.
 *
 * @pure true (Data class)
 * @invariant path.length > 0
 * @complexity O(1)
 */
export class WriteFailed extends Data.TaggedError("WriteFailed")<{
	readonly path: string;
	readonly code: string;
}> {}

/**
 * A prompted value was not an acceptable integer.
 *
 * @pure true (Data class)
 * @invariant reason.length > 0
 * @complexity O(1)
 */
export class InvalidInput extends Data.TaggedError("InvalidInput")<{
	readonly field: RequestField;
	readonly reason: string;
}> {}

/**
 * The input stream ended (or broke) before a value arrived.
 *
 * @pure true (Data class)
 * @complexity O(1)
 */
export class InputClosed extends Data.TaggedError("InputClosed")<{
	readonly field: RequestField;
	readonly detail?: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 * @complexity O(1)
 */
export type AppError = OutputUnavailable | WriteFailed | InvalidInput | InputClosed;

/**
 * Extract a file-system error code (ENOENT, EACCES, ...) from a caught value.
 *
 * @pure true
 * @returns The `code` property when present, otherwise "UNKNOWN"
 * @complexity O(1)
 */
export function errorCodeOf(error: unknown): string {
	if (
		error instanceof Error &&
		"code" in error &&
		typeof error.code === "string"
	) {
		return error.code;
	}
	return "UNKNOWN";
}
