// CHANGE: Fixed wording for prompts and the single outcome line
// WHY: Prompt order and text are part of the interactive contract; keep them in one place
// PURITY: CORE
// INVARIANT: formatErrorMessage is exhaustive over AppError (ts-pattern .exhaustive())
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError, RequestField } from "./errors.js";

/**
 * Prompt shown before each read, in the order the values are requested.
 */
export const PROMPTS: Readonly<Record<RequestField, string>> = {
	count: "How many numbers to generate: ",
	minimum: "Minimum: ",
	maximum: "Maximum: ",
};

export const formatSuccessMessage = (outputPath: string): string =>
	`Done! Numbers are in ${outputPath}`;

/**
 * Human-readable line for a failed run.
 *
 * @pure true
 * @complexity O(1)
 */
export function formatErrorMessage(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "OutputUnavailable" },
			(e) => `File error: could not open ${e.path} for writing (${e.code})`,
		)
		.with(
			{ _tag: "WriteFailed" },
			(e) => `File error: could not write ${e.path} (${e.code})`,
		)
		.with(
			{ _tag: "InvalidInput" },
			(e) => `Invalid input for ${e.field}: ${e.reason}`,
		)
		.with(
			{ _tag: "InputClosed" },
			(e) => `Input ended before ${e.field} was read`,
		)
		.exhaustive();
}
