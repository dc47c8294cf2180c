// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities, keep SHELL internals behind them
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP entry points

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the generator against any {@link Terminal} and {@link RandomSource}.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import {
 *   createSeededRandom,
 *   createStreamTerminal,
 *   runGenerator,
 * } from "random-sequence-writer";
 *
 * const exitCode = await Effect.runPromise(
 *   runGenerator({
 *     terminal: createStreamTerminal(process.stdin, process.stdout),
 *     random: createSeededRandom(42),
 *     options: { outputPath: "out/randoms.txt" },
 *   }),
 * );
 * ```
 */
export {
	type GeneratorEnvironment,
	generateToFile,
	readRequest,
	runGenerator,
} from "./app/runGenerator.js";
export { main, type StdioStreams } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES & PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export {
	type AppError,
	InputClosed,
	InvalidInput,
	OutputUnavailable,
	type RequestField,
	WriteFailed,
} from "./core/errors.js";
export {
	formatErrorMessage,
	formatSuccessMessage,
	PROMPTS,
} from "./core/messages.js";
export {
	DEFAULT_OUTPUT_FILE,
	defaultGeneratorOptions,
	type ExitCode,
	type GenerationRequest,
	type GeneratorOptions,
	type RunOutcome,
} from "./core/models.js";
export {
	createSeededRandom,
	RANDOM_MAX,
	type RandomSource,
	seedFromClock,
} from "./core/random.js";
export { formatLine, generateSequence, sampleInRange } from "./core/sequence.js";
export { parseIntegerToken, validateRequest } from "./core/validation.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export { writeSequenceFile } from "./shell/output/file-writer.js";
export {
	createStreamTerminal,
	type Terminal,
	tokenize,
} from "./shell/terminal/terminal.js";
