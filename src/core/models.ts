// CHANGE: Domain models for the random sequence writer (pure, immutable)
// WHY: CORE holds only types and invariants; SHELL and APP consume them
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { AppError } from "./errors.js";

/**
 * Exit code for the generator process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * The three prompted values.
 *
 * @invariant count ≥ 0 ∧ minimum ≤ maximum (after validation)
 */
export interface GenerationRequest {
	readonly count: number;
	readonly minimum: number;
	readonly maximum: number;
}

/**
 * Where the output artifact is written.
 *
 * @remarks
 * Relative paths resolve against the process working directory.
 */
export interface GeneratorOptions {
	readonly outputPath: string;
}

export const DEFAULT_OUTPUT_FILE = "randoms.txt";

export const defaultGeneratorOptions: GeneratorOptions = {
	outputPath: DEFAULT_OUTPUT_FILE,
};

/**
 * Terminal state of a run.
 *
 * @invariant Succeeded ⇒ file at outputPath has exactly `written` lines
 */
export type RunOutcome =
	| {
			readonly _tag: "Succeeded";
			readonly written: number;
			readonly outputPath: string;
	  }
	| { readonly _tag: "Failed"; readonly error: AppError };
