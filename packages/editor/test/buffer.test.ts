import assert from "node:assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { Buffer, FileAccessError, splitLines } from "../src/view/buffer.js";
import { FileInfo, NO_NAME } from "../src/view/file-info.js";

describe("splitLines", () => {
	it("drops the empty line after a trailing newline", () => {
		assert.deepStrictEqual(splitLines("a\nb\n"), ["a", "b"]);
		assert.deepStrictEqual(splitLines("a\n\n"), ["a", ""]);
	});

	it("accepts CRLF line endings", () => {
		assert.deepStrictEqual(splitLines("a\r\nb"), ["a", "b"]);
	});

	it("returns no lines for empty content", () => {
		assert.deepStrictEqual(splitLines(""), []);
	});
});

describe("FileInfo", () => {
	it("names an unsaved document", () => {
		assert.strictEqual(new FileInfo().displayName, NO_NAME);
		assert.strictEqual(new FileInfo().hasPath(), false);
	});

	it("shows only the base name of a path", () => {
		assert.strictEqual(new FileInfo("/tmp/notes/todo.txt").displayName, "todo.txt");
	});
});

describe("Buffer", () => {
	describe("editing", () => {
		it("inserts text inside a line and returns the position after it", () => {
			const buffer = Buffer.fromLines(["ab"]);
			assert.deepStrictEqual(buffer.insertText("X", { lineIndex: 0, graphemeIndex: 1 }), {
				lineIndex: 0,
				graphemeIndex: 2,
			});
			assert.deepStrictEqual(buffer.toLines(), ["aXb"]);
			assert.strictEqual(buffer.isDirty, true);
		});

		it("advances by clusters, not code units", () => {
			const buffer = Buffer.fromLines(["ab"]);
			assert.deepStrictEqual(buffer.insertText("🎉", { lineIndex: 0, graphemeIndex: 2 }), {
				lineIndex: 0,
				graphemeIndex: 3,
			});
		});

		it("creates a line when inserting on the line past the end", () => {
			const buffer = Buffer.fromLines([]);
			buffer.insertText("hi", { lineIndex: 0, graphemeIndex: 0 });
			assert.deepStrictEqual(buffer.toLines(), ["hi"]);
		});

		it("splits multi-line text across new lines", () => {
			const buffer = Buffer.fromLines(["abcd"]);
			const end = buffer.insertText("1\n2\n3", { lineIndex: 0, graphemeIndex: 2 });
			assert.deepStrictEqual(buffer.toLines(), ["ab1", "2", "3cd"]);
			assert.deepStrictEqual(end, { lineIndex: 2, graphemeIndex: 1 });
		});

		it("ignores positions outside the document", () => {
			const buffer = Buffer.fromLines(["a"]);
			buffer.insertText("x", { lineIndex: 5, graphemeIndex: 0 });
			assert.deepStrictEqual(buffer.toLines(), ["a"]);
			assert.strictEqual(buffer.isDirty, false);
		});

		it("breaks a line at the cursor", () => {
			const buffer = Buffer.fromLines(["abc"]);
			buffer.insertNewline({ lineIndex: 0, graphemeIndex: 1 });
			assert.deepStrictEqual(buffer.toLines(), ["a", "bc"]);
		});

		it("appends an empty line from the line past the end", () => {
			const buffer = Buffer.fromLines(["a"]);
			buffer.insertNewline({ lineIndex: 1, graphemeIndex: 0 });
			assert.deepStrictEqual(buffer.toLines(), ["a", ""]);
		});

		it("joins the next line when deleting at the end of a line", () => {
			const buffer = Buffer.fromLines(["ab", "cd"]);
			buffer.delete({ lineIndex: 0, graphemeIndex: 2 });
			assert.deepStrictEqual(buffer.toLines(), ["abcd"]);
			buffer.delete({ lineIndex: 0, graphemeIndex: 4 });
			assert.deepStrictEqual(buffer.toLines(), ["abcd"]);
		});

		it("deletes a range spanning lines in either order", () => {
			const buffer = Buffer.fromLines(["hello", "big", "world"]);
			buffer.deleteRange({ lineIndex: 2, graphemeIndex: 2 }, { lineIndex: 0, graphemeIndex: 3 });
			assert.deepStrictEqual(buffer.toLines(), ["helrld"]);
		});

		it("deletes a range within one line", () => {
			const buffer = Buffer.fromLines(["abcdef"]);
			buffer.deleteRange({ lineIndex: 0, graphemeIndex: 1 }, { lineIndex: 0, graphemeIndex: 4 });
			assert.deepStrictEqual(buffer.toLines(), ["aef"]);
		});
	});

	describe("files", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "glyph-buffer-"));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it("loads a file into lines", async () => {
			const path = join(dir, "notes.txt");
			writeFileSync(path, "hello\nworld\n");
			const buffer = await Buffer.load(path);
			assert.deepStrictEqual(buffer.toLines(), ["hello", "world"]);
			assert.strictEqual(buffer.fileInfo.displayName, "notes.txt");
			assert.strictEqual(buffer.isDirty, false);
		});

		it("reports a file that cannot be opened", async () => {
			const path = join(dir, "missing.txt");
			await assert.rejects(Buffer.load(path), (error: unknown) => {
				assert.ok(error instanceof FileAccessError);
				assert.strictEqual(error.message, `Could not open file: ${path}`);
				assert.strictEqual(error.path, path);
				return true;
			});
		});

		it("writes every line with a newline and clears the dirty flag", async () => {
			const path = join(dir, "out.txt");
			const buffer = Buffer.fromLines(["a"]);
			buffer.insertText("b", { lineIndex: 1, graphemeIndex: 0 });
			await buffer.saveAs(path);
			assert.strictEqual(readFileSync(path, "utf8"), "a\nb\n");
			assert.strictEqual(buffer.isDirty, false);
			assert.strictEqual(buffer.fileInfo.path, path);
		});

		it("needs a file name to save", async () => {
			await assert.rejects(Buffer.fromLines(["a"]).save(), FileAccessError);
		});

		it("keeps the document modified when the write fails", async () => {
			const path = join(dir, "no-such-dir", "out.txt");
			const buffer = Buffer.fromLines(["a"]);
			buffer.insertText("b", { lineIndex: 0, graphemeIndex: 1 });
			await assert.rejects(buffer.saveAs(path), { message: `Could not write file: ${path}` });
			assert.strictEqual(buffer.isDirty, true);
			assert.strictEqual(buffer.fileInfo.hasPath(), false);
		});
	});
});
