// CHANGE: Make main.ts a thin APP delegator
// WHY: main wires stdio and the clock-seeded generator, then delegates to app/runGenerator
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value; the generator is seeded exactly once per run
// COMPLEXITY: O(1) + O(count) delegated

import { Effect } from "effect";

import { runGenerator } from "./app/runGenerator.js";
import {
	defaultGeneratorOptions,
	type ExitCode,
	type GeneratorOptions,
} from "./core/models.js";
import { createSeededRandom, seedFromClock } from "./core/random.js";
import { createStreamTerminal } from "./shell/terminal/terminal.js";
import type { Readable, Writable } from "./shell/utils/node-mods.js";

/**
 * Streams backing the interactive channel; process stdio unless overridden.
 */
export interface StdioStreams {
	readonly input: Readable;
	readonly output: Writable;
}

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (stdio, clock, file system), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export function main(
	options: GeneratorOptions = defaultGeneratorOptions,
	stdio: StdioStreams = { input: process.stdin, output: process.stdout },
): Promise<ExitCode> {
	const terminal = createStreamTerminal(stdio.input, stdio.output);
	const random = createSeededRandom(seedFromClock(Date.now()));
	return Effect.runPromise(
		runGenerator({ terminal, random, options }).pipe(
			Effect.ensuring(terminal.close()),
		),
	);
}
