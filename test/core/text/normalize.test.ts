// Deterministic and property-based specs for line normalization
// FORMAT THEOREM: ∀R: |N(R)| = |R| ∧ N(N(R)) = N(R)
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import type { RawDocument } from "../../../src/core/models.js";
import {
	normalizeDocument,
	normalizeLine,
} from "../../../src/core/text/normalize.js";

const rawOf = (lines: readonly string[]): RawDocument => ({
	kind: "raw",
	path: "memory.txt",
	lines,
});

describe("normalizeLine", (): void => {
	it("lowercases, strips punctuation and trims", (): void => {
		expect(normalizeLine("  Hello, World!  ")).toBe("hello world");
	});

	it("keeps digits and letters outside ASCII", (): void => {
		expect(normalizeLine("Caf\u00e9 No. 42 \u2014 \u00dcn\u00efcode?")).toBe(
			"caf\u00e9 no 42 \u00fcn\u00efcode",
		);
	});

	it("removes underscores and symbols", (): void => {
		expect(normalizeLine("snake_case + $5 #tag")).toBe("snakecase 5 tag");
	});

	it("collapses internal whitespace runs to one space", (): void => {
		expect(normalizeLine("a \t b   c")).toBe("a b c");
	});

	it("turns a punctuation-only line into an empty string", (): void => {
		expect(normalizeLine("?!...")).toBe("");
	});

	it("accepts a custom punctuation pattern", (): void => {
		expect(normalizeLine("Keep-Dashes, drop commas", { punctuation: /,/g })).toBe(
			"keep-dashes drop commas",
		);
	});
});

describe("normalizeDocument", (): void => {
	it("cleans each line and keeps empty lines", (): void => {
		const clean = normalizeDocument(rawOf(["Hello, World!", "hello world", ""]));
		expect(clean).toEqual({
			kind: "clean",
			lines: ["hello world", "hello world", ""],
		});
	});

	it("maps an empty document to an empty document", (): void => {
		expect(normalizeDocument(rawOf([])).lines).toEqual([]);
	});

	it("preserves line count for arbitrary input", (): void => {
		fc.assert(
			fc.property(fc.array(fc.string()), (lines) => {
				expect(normalizeDocument(rawOf(lines)).lines).toHaveLength(lines.length);
			}),
		);
	});

	it("is idempotent", (): void => {
		fc.assert(
			fc.property(fc.array(fc.string()), (lines) => {
				const once = normalizeDocument(rawOf(lines));
				const twice = normalizeDocument(rawOf(once.lines));
				expect(twice).toEqual(once);
			}),
		);
	});
});
