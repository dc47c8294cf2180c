// CHANGE: Interactive channel abstraction (prompts out, integer tokens in)
// WHY: APP talks to an interface; the stdio implementation and the test double are interchangeable
// PURITY: SHELL
// EFFECT: Effect<Option<string>, InputClosed> per token
// INVARIANT: Tokens are delivered in input order; a token is never delivered twice
// COMPLEXITY: O(|line|) per line read

import { Effect, Option } from "effect";

import { errorCodeOf, InputClosed, type RequestField } from "../../core/errors.js";
import { type Readable, readline, type Writable } from "../utils/node-mods.js";

/**
 * Interactive input/output used by the generator.
 *
 * @remarks
 * `readToken` yields `None` once the input is exhausted.
 */
export interface Terminal {
	readonly write: (text: string) => Effect.Effect<void>;
	readonly readToken: (
		field: RequestField,
	) => Effect.Effect<Option.Option<string>, InputClosed>;
	readonly close: () => Effect.Effect<void>;
}

/**
 * Split a raw input line into whitespace-separated tokens.
 *
 * @pure true
 * @example tokenize("  5 1\t10 ") // ["5", "1", "10"]
 */
export const tokenize = (line: string): readonly string[] =>
	line.split(/\s+/u).filter((token) => token.length > 0);

/**
 * Terminal over a pair of Node streams (process.stdin / process.stdout in production).
 *
 * @pure false (reads and writes streams)
 */
export function createStreamTerminal(
	input: Readable,
	output: Writable,
): Terminal {
	const rl = readline.createInterface({ input, terminal: false });
	const lines = rl[Symbol.asyncIterator]();
	const pending: string[] = [];

	const nextLine = (field: RequestField) =>
		Effect.tryPromise({
			try: () => lines.next(),
			catch: (error) =>
				new InputClosed({ field, detail: errorCodeOf(error) }),
		});

	const readToken = (
		field: RequestField,
	): Effect.Effect<Option.Option<string>, InputClosed> =>
		Effect.gen(function* () {
			while (pending.length === 0) {
				const result = yield* nextLine(field);
				if (result.done === true) {
					return Option.none();
				}
				pending.push(...tokenize(result.value));
			}
			return Option.fromNullable(pending.shift());
		});

	return {
		write: (text) =>
			Effect.sync(() => {
				output.write(text);
			}),
		readToken,
		close: () =>
			Effect.sync(() => {
				rl.close();
			}),
	};
}
