import assert from "node:assert";
import { describe, it } from "node:test";
import type { Annotation } from "../src/annotation/annotation.js";
import { dominantAnnotation } from "../src/annotation/annotation.js";
import { AnnotatedStringIterator } from "../src/annotation/annotated-string-iterator.js";
import { textFragmentsOf } from "../src/line/text-fragment.js";

function parts(text: string, start: number, end: number, annotations: Annotation[] = []) {
	return [...new AnnotatedStringIterator(textFragmentsOf(text), { start, end }, annotations)];
}

describe("dominantAnnotation", () => {
	const annotations: Annotation[] = [
		{ type: "match", start: 0, end: 4 },
		{ type: "selection", start: 1, end: 3 },
		{ type: "selectedMatch", start: 0, end: 2 },
	];

	it("picks the highest precedence among overlapping annotations", () => {
		assert.strictEqual(dominantAnnotation(annotations, 0, 1), "selectedMatch");
		assert.strictEqual(dominantAnnotation(annotations, 2, 3), "selection");
		assert.strictEqual(dominantAnnotation(annotations, 3, 4), "match");
	});

	it("treats ranges as half open", () => {
		assert.strictEqual(dominantAnnotation(annotations, 4, 5), undefined);
	});
});

describe("AnnotatedStringIterator", () => {
	it("coalesces runs with the same style", () => {
		assert.deepStrictEqual(
			parts("hello world", 0, 12, [
				{ type: "match", start: 0, end: 5 },
				{ type: "selectedMatch", start: 6, end: 11 },
			]),
			[
				{ text: "hello", width: 5, type: "match" },
				{ text: " ", width: 1 },
				{ text: "world", width: 5, type: "selectedMatch" },
				{ text: " ", width: 1 },
			],
		);
	});

	it("resolves overlaps by precedence", () => {
		assert.deepStrictEqual(
			parts("abcd", 0, 4, [
				{ type: "match", start: 0, end: 4 },
				{ type: "selection", start: 1, end: 3 },
			]),
			[
				{ text: "a", width: 1, type: "match" },
				{ text: "bc", width: 2, type: "selection" },
				{ text: "d", width: 1, type: "match" },
			],
		);
	});

	it("never styles the padding", () => {
		assert.deepStrictEqual(parts("ab", 0, 4, [{ type: "match", start: 0, end: 2 }]), [
			{ text: "ab", width: 2, type: "match" },
			{ text: "  ", width: 2 },
		]);
	});

	it("keeps the style of a clipped wide cluster", () => {
		assert.deepStrictEqual(parts("日本", 1, 4, [{ type: "match", start: 0, end: 1 }]), [
			{ text: " ", width: 1, type: "match" },
			{ text: "本", width: 2 },
		]);
	});

	it("fills a window past the end of the line with spaces", () => {
		assert.deepStrictEqual(parts("ab", 5, 8), [{ text: "   ", width: 3 }]);
	});

	it("yields nothing for an empty window", () => {
		assert.deepStrictEqual(parts("abc", 2, 2), []);
	});

	it("restarts on every iteration", () => {
		const iterator = new AnnotatedStringIterator(textFragmentsOf("abc"), { start: 0, end: 3 });
		assert.strictEqual(iterator.toString(), "abc");
		assert.strictEqual(iterator.toString(), "abc");
		assert.strictEqual(iterator.width, 3);
	});

	it("renders replacement glyphs", () => {
		assert.strictEqual(new AnnotatedStringIterator(textFragmentsOf("a\tb\x01"), { start: 0, end: 4 }).toString(), "a b▯");
	});

	it("can leave the line unpadded", () => {
		const iterator = new AnnotatedStringIterator(textFragmentsOf("ab"), { start: 0, end: 5 }, [], { padToWindow: false });
		assert.deepStrictEqual([...iterator], [{ text: "ab", width: 2 }]);
	});
});
