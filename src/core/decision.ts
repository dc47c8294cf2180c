// CHANGE: Pure decision function mapping a run outcome to the process exit code
// WHY: Centralize termination logic in Functional Core; BIN only forwards the value
// FORMAT THEOREM: ∀o ∈ RunOutcome: o._tag = "Failed" ↔ computeExitCode(o) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping RunOutcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { ExitCode, RunOutcome } from "./models.js";

/**
 * Computes process exit code from the outcome of a run.
 *
 * @returns 0 when the file was written, otherwise 1
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ _tag: "Succeeded", written: 5, outputPath: "randoms.txt" }); // 0
 * ```
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	pipe(
		outcome,
		(o) => o._tag === "Succeeded",
		(succeeded): ExitCode => (succeeded ? 0 : 1),
	);
