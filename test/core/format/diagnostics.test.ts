import { describe, expect, it } from "vitest";

import { IOError, NotFound } from "../../../src/core/errors.js";
import { describeAppError } from "../../../src/core/format/diagnostics.js";

describe("describeAppError", (): void => {
	it("names the missing input path", (): void => {
		const error = new NotFound({
			path: "absent.txt",
			reason: "missing",
			detail: "ENOENT: no such file or directory",
		});
		expect(describeAppError(error)).toBe("❌ Input file not found: absent.txt");
	});

	it("includes the cause for an unreadable input", (): void => {
		const error = new NotFound({
			path: "dir",
			reason: "unreadable",
			detail: "EISDIR: illegal operation on a directory, read",
		});
		expect(describeAppError(error)).toBe(
			"❌ Cannot read input file dir: EISDIR: illegal operation on a directory, read",
		);
	});

	it("names the output file that could not be written", (): void => {
		const error = new IOError({
			target: { destination: "file", path: "out/report.txt" },
			detail: "EACCES: permission denied",
		});
		expect(describeAppError(error)).toBe(
			"❌ Cannot write report to out/report.txt: EACCES: permission denied",
		);
	});

	it("reports console failures separately", (): void => {
		const error = new IOError({
			target: { destination: "console" },
			detail: "EPIPE",
		});
		expect(describeAppError(error)).toBe(
			"❌ Cannot write report to console: EPIPE",
		);
	});
});
