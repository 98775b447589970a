import assert from "node:assert";
import { describe, it } from "node:test";
import { CURSOR_MARKER } from "@glyph-editor/tui";
import { CommandBar } from "../src/components/command-bar.js";
import { MessageBar } from "../src/components/message-bar.js";
import { formatStatus, StatusBar } from "../src/components/status-bar.js";
import { type DocumentStatus, lineCountText, modifiedIndicator, positionIndicator } from "../src/document-status.js";
import { plainTheme } from "../src/theme.js";

const status: DocumentStatus = { totalLines: 3, currentLineIndex: 0, isModified: true, fileName: "a.txt" };

describe("document status", () => {
	it("formats its parts", () => {
		assert.strictEqual(modifiedIndicator(status), "(modified)");
		assert.strictEqual(modifiedIndicator({ ...status, isModified: false }), "");
		assert.strictEqual(lineCountText(status), "3 lines");
		assert.strictEqual(positionIndicator({ ...status, currentLineIndex: 1 }), "2/3");
	});
});

describe("formatStatus", () => {
	it("right-aligns the position", () => {
		assert.strictEqual(formatStatus(status, 40), `a.txt - 3 lines (modified)${" ".repeat(11)}1/3`);
	});

	it("keeps the space before an empty modified indicator", () => {
		assert.strictEqual(formatStatus({ ...status, isModified: false }, 20), "a.txt - 3 lines  1/3");
	});

	it("gives up when the text does not fit", () => {
		assert.strictEqual(formatStatus(status, 10), "");
	});
});

describe("StatusBar", () => {
	it("fills the whole row", () => {
		const bar = new StatusBar(plainTheme);
		bar.resize({ width: 30, height: 1 });
		bar.updateStatus({ totalLines: 0, currentLineIndex: 0, isModified: false, fileName: "[No Name]" });
		assert.deepStrictEqual(bar.render(), [`[No Name] - 0 lines ${" ".repeat(7)}1/0`]);
	});

	it("renders a blank row when too narrow", () => {
		const bar = new StatusBar(plainTheme);
		bar.resize({ width: 5, height: 1 });
		bar.updateStatus(status);
		assert.deepStrictEqual(bar.render(), ["     "]);
	});

	it("re-renders after the status changes", () => {
		const bar = new StatusBar(plainTheme);
		bar.resize({ width: 40, height: 1 });
		bar.updateStatus(status);
		const first = bar.render();
		assert.strictEqual(bar.render(), first);
		bar.updateStatus({ ...status, currentLineIndex: 2 });
		assert.strictEqual(bar.render()[0]?.endsWith("3/3"), true);
	});
});

describe("MessageBar", () => {
	function createBar(): { bar: MessageBar; clock: { now: number } } {
		const clock = { now: 1000 };
		const bar = new MessageBar({ theme: plainTheme, timeoutMs: 5000, now: () => clock.now });
		bar.resize({ width: 10, height: 1 });
		return { bar, clock };
	}

	it("shows a message until it expires", () => {
		const { bar, clock } = createBar();
		bar.setMessage("hi");
		assert.deepStrictEqual(bar.render(), ["hi"]);
		clock.now = 6000;
		assert.strictEqual(bar.getMessage(), "hi");
		clock.now = 6001;
		assert.strictEqual(bar.isExpired(), true);
		assert.deepStrictEqual(bar.render(), [""]);
	});

	it("cuts long messages at the bar width", () => {
		const { bar } = createBar();
		bar.setMessage("File saved successfully.");
		assert.deepStrictEqual(bar.render(), ["File saved\x1b[0m"]);
	});
});

describe("CommandBar", () => {
	function createBar(width: number): CommandBar {
		const bar = new CommandBar(plainTheme);
		bar.setPrompt("Find: ");
		bar.resize({ width, height: 1 });
		return bar;
	}

	it("shows the prompt followed by the value", () => {
		const bar = createBar(10);
		bar.handleEditCommand({ kind: "edit", action: "insert", text: "abc" });
		assert.strictEqual(bar.getValue(), "abc");
		assert.strictEqual(bar.visibleText(), "Find: abc");
		assert.strictEqual(bar.caretColumn(), 9);
		bar.focused = true;
		assert.deepStrictEqual(bar.render(), [`Find: abc${CURSOR_MARKER}`]);
	});

	it("shows the tail of a value that does not fit", () => {
		const bar = createBar(10);
		bar.handleEditCommand({ kind: "edit", action: "insert", text: "abcdefg" });
		assert.strictEqual(bar.visibleText(), "Find: defg");
		assert.strictEqual(bar.caretColumn(), 10);
	});

	it("removes the last cluster on backspace and drops line breaks", () => {
		const bar = createBar(20);
		bar.handleEditCommand({ kind: "edit", action: "insert", text: "x\ny🎉" });
		assert.strictEqual(bar.getValue(), "xy🎉");
		bar.handleEditCommand({ kind: "edit", action: "deleteBackward" });
		assert.strictEqual(bar.getValue(), "xy");
		bar.clearValue();
		assert.strictEqual(bar.getValue(), "");
	});

	it("renders blank when the prompt itself does not fit", () => {
		const bar = createBar(4);
		assert.strictEqual(bar.visibleText(), "");
		assert.deepStrictEqual(bar.render(), [""]);
	});
});
