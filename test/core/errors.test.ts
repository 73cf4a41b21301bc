import { describe, expect, it } from "vitest";

import { describeCause, IOError, NotFound } from "../../src/core/errors.js";

describe("describeCause", (): void => {
	it("uses the message of an Error", (): void => {
		expect(describeCause(new Error("EACCES: permission denied"))).toBe(
			"EACCES: permission denied",
		);
	});

	it("stringifies anything else", (): void => {
		expect(describeCause("broken pipe")).toBe("broken pipe");
		expect(describeCause(42)).toBe("42");
	});
});

describe("tagged errors", (): void => {
	it("carry their tag and fields", (): void => {
		const missing = new NotFound({ path: "a.txt", reason: "missing", detail: "x" });
		const unwritable = new IOError({
			target: { destination: "file", path: "b.txt" },
			detail: "y",
		});
		expect(missing._tag).toBe("NotFound");
		expect(missing.path).toBe("a.txt");
		expect(unwritable._tag).toBe("IOError");
		expect(unwritable.target).toEqual({ destination: "file", path: "b.txt" });
	});
});
