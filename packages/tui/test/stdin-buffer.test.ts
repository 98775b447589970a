import assert from "node:assert";
import { afterEach, beforeEach, describe, it } from "node:test";
import { StdinBuffer } from "../src/stdin-buffer.js";

describe("StdinBuffer", () => {
	let buffer: StdinBuffer;
	let emitted: string[];
	let pasted: string[];

	beforeEach(() => {
		buffer = new StdinBuffer({ timeout: 5 });
		emitted = [];
		pasted = [];
		buffer.on("data", (sequence) => emitted.push(sequence));
		buffer.on("paste", (content) => pasted.push(content));
	});

	afterEach(() => {
		buffer.destroy();
	});

	it("splits a batch into individual sequences", () => {
		buffer.process("\x1b[A\x1b[Bx");
		assert.deepStrictEqual(emitted, ["\x1b[A", "\x1b[B", "x"]);
	});

	it("keeps surrogate pairs together", () => {
		buffer.process("🎉a");
		assert.deepStrictEqual(emitted, ["🎉", "a"]);
	});

	it("joins an escape sequence that arrives in two chunks", () => {
		buffer.process("\x1b");
		assert.deepStrictEqual(emitted, []);
		buffer.process("[A");
		assert.deepStrictEqual(emitted, ["\x1b[A"]);
	});

	it("emits a lone escape after the timeout", async () => {
		buffer.process("\x1b");
		await new Promise((resolve) => setTimeout(resolve, 30));
		assert.deepStrictEqual(emitted, ["\x1b"]);
	});

	it("emits bracketed paste content as one event", () => {
		buffer.process("a\x1b[200~hello\nworld\x1b[201~b");
		assert.deepStrictEqual(emitted, ["a", "b"]);
		assert.deepStrictEqual(pasted, ["hello\nworld"]);
	});

	it("accumulates a paste split across chunks", () => {
		buffer.process("\x1b[200~one ");
		buffer.process("two\x1b[201~");
		assert.deepStrictEqual(pasted, ["one two"]);
		assert.deepStrictEqual(emitted, []);
	});
});
