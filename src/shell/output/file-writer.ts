// CHANGE: Write the generated sequence to the output artifact
// WHY: The descriptor is the only resource of a run; acquireUseRelease guarantees it is closed once opened
// PURITY: SHELL (file-system effects)
// EFFECT: Effect<number, OutputUnavailable | WriteFailed>
// INVARIANT: open fails ⇒ values are never pulled; success ⇒ file holds exactly the pulled values, one per line
// COMPLEXITY: O(n) where n = number of values

import { Effect } from "effect";

import {
	errorCodeOf,
	OutputUnavailable,
	WriteFailed,
} from "../../core/errors.js";
import { formatLine } from "../../core/sequence.js";
import { fs } from "../utils/node-mods.js";

/**
 * Open (create or truncate) a file for writing.
 *
 * @pure false (file-system effect)
 * @effect Effect<number, OutputUnavailable>
 */
export function openOutputFile(
	filePath: string,
): Effect.Effect<number, OutputUnavailable> {
	return Effect.try({
		try: () => fs.openSync(filePath, "w"),
		catch: (error) =>
			new OutputUnavailable({ path: filePath, code: errorCodeOf(error) }),
	});
}

function writeLines(
	fd: number,
	filePath: string,
	values: Iterable<number>,
): Effect.Effect<number, WriteFailed> {
	return Effect.try({
		try: () => {
			let written = 0;
			for (const value of values) {
				fs.writeSync(fd, formatLine(value));
				written += 1;
			}
			return written;
		},
		catch: (error) =>
			new WriteFailed({ path: filePath, code: errorCodeOf(error) }),
	});
}

/**
 * Write every value of a (lazy) sequence to `filePath`, one decimal per line.
 *
 * @param filePath - Output artifact location, truncated on open
 * @param makeValues - Called only after the file is open
 * @returns Effect with the number of lines written
 *
 * @pure false (file-system effect)
 * @effect Effect<number, OutputUnavailable | WriteFailed>
 * @postcondition open succeeded ⇒ the descriptor is closed on every exit path
 */
export function writeSequenceFile(
	filePath: string,
	makeValues: () => Iterable<number>,
): Effect.Effect<number, OutputUnavailable | WriteFailed> {
	return Effect.acquireUseRelease(
		openOutputFile(filePath),
		(fd) => writeLines(fd, filePath, makeValues()),
		// A failing close is a defect, not a typed failure
		(fd) => Effect.sync(() => fs.closeSync(fd)),
	);
}
