// CHANGE: Application layer orchestration (APP) for the random sequence writer
// WHY: APP composes pure CORE logic with SHELL integrations and returns the exit code as a value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Exactly one outcome line is written to the terminal per run
// COMPLEXITY: O(count)

import { Effect, Option } from "effect";

import { computeExitCode } from "../core/decision.js";
import { type AppError, InputClosed, type RequestField } from "../core/errors.js";
import {
	formatErrorMessage,
	formatSuccessMessage,
	PROMPTS,
} from "../core/messages.js";
import type {
	ExitCode,
	GenerationRequest,
	GeneratorOptions,
	RunOutcome,
} from "../core/models.js";
import type { RandomSource } from "../core/random.js";
import { generateSequence } from "../core/sequence.js";
import { parseIntegerToken, validateRequest } from "../core/validation.js";
import { writeSequenceFile } from "../shell/output/file-writer.js";
import type { Terminal } from "../shell/terminal/terminal.js";

/**
 * Everything a run needs from the outside world.
 *
 * @remarks
 * `random` is constructed by the caller (seeded once per run).
 */
export interface GeneratorEnvironment {
	readonly terminal: Terminal;
	readonly random: RandomSource;
	readonly options: GeneratorOptions;
}

function promptInteger(
	terminal: Terminal,
	field: RequestField,
): Effect.Effect<number, AppError> {
	return Effect.gen(function* () {
		yield* terminal.write(PROMPTS[field]);
		const token = yield* terminal.readToken(field);
		if (Option.isNone(token)) {
			return yield* Effect.fail(new InputClosed({ field }));
		}
		return yield* parseIntegerToken(field, token.value);
	});
}

/**
 * Prompt for count, minimum and maximum in that order.
 *
 * @effect Effect<GenerationRequest, InvalidInput | InputClosed>
 * @postcondition count ≥ 0 ∧ minimum ≤ maximum
 */
export function readRequest(
	terminal: Terminal,
): Effect.Effect<GenerationRequest, AppError> {
	return Effect.gen(function* () {
		const count = yield* promptInteger(terminal, "count");
		const minimum = yield* promptInteger(terminal, "minimum");
		const maximum = yield* promptInteger(terminal, "maximum");
		return yield* validateRequest({ count, minimum, maximum });
	});
}

/**
 * Runs one generation and reports it; never fails.
 *
 * @effect Effect<RunOutcome, never>
 */
export function generateToFile(
	env: GeneratorEnvironment,
): Effect.Effect<RunOutcome> {
	const { terminal, random, options } = env;
	return Effect.gen(function* () {
		const request = yield* readRequest(terminal);
		const written = yield* writeSequenceFile(options.outputPath, () =>
			generateSequence(request, random),
		);
		return {
			_tag: "Succeeded",
			written,
			outputPath: options.outputPath,
		} satisfies RunOutcome;
	}).pipe(
		Effect.catchAll((error) =>
			Effect.succeed<RunOutcome>({ _tag: "Failed", error }),
		),
		Effect.tap((outcome) =>
			terminal.write(
				`${
					outcome._tag === "Succeeded"
						? formatSuccessMessage(outcome.outputPath)
						: formatErrorMessage(outcome.error)
				}\n`,
			),
		),
	);
}

/**
 * Orchestrates a run and returns ExitCode as value (no process.exit).
 *
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition outcome failed → 1 else 0
 */
export function runGenerator(
	env: GeneratorEnvironment,
): Effect.Effect<ExitCode> {
	return generateToFile(env).pipe(Effect.map(computeExitCode));
}
