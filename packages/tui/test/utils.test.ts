import assert from "node:assert";
import { describe, it } from "node:test";
import { graphemeWidth, isControlGrapheme, padToWidth, segmentGraphemes, truncateToWidth, visibleWidth } from "../src/utils.js";

describe("graphemeWidth", () => {
	it("gives ASCII printable characters one column", () => {
		assert.strictEqual(graphemeWidth("a"), 1);
		assert.strictEqual(graphemeWidth(" "), 1);
	});

	it("gives wide characters and emoji two columns", () => {
		assert.strictEqual(graphemeWidth("中"), 2);
		assert.strictEqual(graphemeWidth("🎉"), 2);
	});

	it("counts a base letter with a combining accent as one column", () => {
		assert.strictEqual(graphemeWidth("e\u0301"), 1);
	});

	it("gives control and default-ignorable characters zero columns", () => {
		assert.strictEqual(graphemeWidth("\t"), 0);
		assert.strictEqual(graphemeWidth("\u200B"), 0);
		assert.strictEqual(graphemeWidth(""), 0);
	});
});

describe("segmentGraphemes", () => {
	it("returns clusters with their code unit offsets", () => {
		assert.deepStrictEqual(segmentGraphemes("a🎉b"), [
			{ segment: "a", index: 0 },
			{ segment: "🎉", index: 1 },
			{ segment: "b", index: 3 },
		]);
	});
});

describe("isControlGrapheme", () => {
	it("detects single control characters only", () => {
		assert.strictEqual(isControlGrapheme("\x07"), true);
		assert.strictEqual(isControlGrapheme("a"), false);
	});
});

describe("visibleWidth", () => {
	it("ignores ANSI styling", () => {
		assert.strictEqual(visibleWidth("\x1b[31mhi\x1b[0m"), 2);
	});

	it("sums wide clusters", () => {
		assert.strictEqual(visibleWidth("café🎉"), 6);
	});
});

describe("truncateToWidth", () => {
	it("appends an ellipsis after a style reset", () => {
		assert.strictEqual(truncateToWidth("hello world", 8), "hello\x1b[0m...");
	});

	it("pads short text when asked", () => {
		assert.strictEqual(truncateToWidth("ab", 5, "...", true), "ab   ");
	});

	it("never splits a wide character", () => {
		assert.strictEqual(truncateToWidth("中文字", 5, "", true), "中文\x1b[0m ");
	});

	it("returns an empty string for a non-positive width", () => {
		assert.strictEqual(truncateToWidth("abc", 0), "");
	});
});

describe("padToWidth", () => {
	it("pads to the requested width without truncating", () => {
		assert.strictEqual(padToWidth("ab", 4), "ab  ");
		assert.strictEqual(padToWidth("abcdef", 4), "abcdef");
	});
});
