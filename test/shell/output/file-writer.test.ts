// CHANGE: Specs for writing the output artifact
// WHY: Truncation, line format and the open-failure path are observable on disk
// PURITY: SHELL - real files inside a per-test temporary directory
// INVARIANT: open fails ⇒ values are never requested and no file appears

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	openOutputFile,
	writeSequenceFile,
} from "../../../src/shell/output/file-writer.js";
import { createTempDir, readLines, type TempDir } from "../../utils/tempDir.js";

describe("writeSequenceFile", () => {
	let tmp: TempDir;

	beforeEach(() => {
		tmp = createTempDir();
	});

	afterEach(() => {
		tmp.cleanup();
	});

	it("writes one decimal per line and returns the count", () => {
		const file = tmp.file("randoms.txt");
		const written = Effect.runSync(writeSequenceFile(file, () => [3, -1, 0]));
		expect(written).toBe(3);
		expect(fs.readFileSync(file, "utf-8")).toBe("3\n-1\n0\n");
	});

	it("creates an empty file for an empty sequence", () => {
		const file = tmp.file("randoms.txt");
		expect(Effect.runSync(writeSequenceFile(file, () => []))).toBe(0);
		expect(fs.existsSync(file)).toBe(true);
		expect(fs.readFileSync(file, "utf-8")).toBe("");
	});

	it("truncates previous content", () => {
		const file = tmp.file("randoms.txt");
		Effect.runSync(writeSequenceFile(file, () => [1, 2, 3]));
		Effect.runSync(writeSequenceFile(file, () => [9]));
		expect(readLines(file)).toEqual(["9"]);
	});

	it("fails with OutputUnavailable and never asks for values when the directory is missing", () => {
		const file = path.join(tmp.dir, "missing", "randoms.txt");
		let requested = false;
		const result = Effect.runSync(
			Effect.either(
				writeSequenceFile(file, () => {
					requested = true;
					return [1];
				}),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("OutputUnavailable");
			expect(result.left.path).toBe(file);
			expect(result.left.code).toBe("ENOENT");
		}
		expect(requested).toBe(false);
		expect(fs.existsSync(file)).toBe(false);
	});

	it("reports WriteFailed when producing values breaks mid-way", () => {
		const file = tmp.file("randoms.txt");
		function* faulty(): Generator<number> {
			yield 1;
			throw new Error("source broke");
		}
		const result = Effect.runSync(
			Effect.either(writeSequenceFile(file, faulty)),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("WriteFailed");
			expect(result.left.code).toBe("UNKNOWN");
		}
		expect(readLines(file)).toEqual(["1"]);
	});
});

describe("openOutputFile", () => {
	it("fails when the target is a directory", () => {
		const tmp = createTempDir();
		try {
			const result = Effect.runSync(Effect.either(openOutputFile(tmp.dir)));
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left.code).toBe("EISDIR");
			}
		} finally {
			tmp.cleanup();
		}
	});
});
