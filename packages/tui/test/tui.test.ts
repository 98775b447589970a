import assert from "node:assert";
import { describe, it } from "node:test";
import { type Component, CURSOR_MARKER, type Focusable, layoutRegions, type Size, TUI } from "../src/tui.js";
import { flushRender, VirtualTerminal } from "./virtual-terminal.js";

class StaticLines implements Component, Focusable {
	size: Size = { width: 0, height: 0 };
	received: string[] = [];
	focused = false;
	invalidations = 0;

	constructor(public lines: string[]) {}

	render(): string[] {
		return this.lines;
	}

	resize(size: Size): void {
		this.size = size;
	}

	invalidate(): void {
		this.invalidations += 1;
	}

	handleInput(data: string): void {
		this.received.push(data);
	}
}

describe("layoutRegions", () => {
	it("gives fixed regions their rows and the fill region the rest", () => {
		const a = new StaticLines([]);
		const b = new StaticLines([]);
		const c = new StaticLines([]);
		const heights = layoutRegions(
			[
				{ component: a, height: "fill" },
				{ component: b, height: 1 },
				{ component: c, height: 1 },
			],
			{ width: 10, height: 5 },
		);
		assert.deepStrictEqual(heights, [3, 1, 1]);
	});

	it("never hands out more rows than the screen has", () => {
		const a = new StaticLines([]);
		const b = new StaticLines([]);
		const heights = layoutRegions(
			[
				{ component: a, height: 2 },
				{ component: b, height: 2 },
			],
			{ width: 10, height: 3 },
		);
		assert.deepStrictEqual(heights, [2, 1]);
	});
});

describe("TUI", () => {
	function setup(): { terminal: VirtualTerminal; tui: TUI; body: StaticLines; footer: StaticLines } {
		const terminal = new VirtualTerminal(10, 4);
		const tui = new TUI(terminal);
		const body = new StaticLines(["top"]);
		const footer = new StaticLines(["bottom"]);
		tui.setRegions([
			{ component: body, height: "fill" },
			{ component: footer, height: 1 },
		]);
		return { terminal, tui, body, footer };
	}

	it("lays out regions and renders every screen row", async () => {
		const { terminal, tui, body, footer } = setup();
		tui.start();
		await flushRender();

		assert.deepStrictEqual(body.size, { width: 10, height: 3 });
		assert.deepStrictEqual(footer.size, { width: 10, height: 1 });
		assert.deepStrictEqual(terminal.getViewport(), ["top", "", "", "bottom"]);
		tui.stop();
	});

	it("rewrites only the rows that changed", async () => {
		const { terminal, tui, body } = setup();
		tui.start();
		await flushRender();

		const before = terminal.output.length;
		body.lines = ["top2"];
		tui.requestRender();
		await flushRender();

		assert.strictEqual(
			terminal.output.slice(before),
			"\x1b[?2026h\x1b[1;1H\x1b[2Ktop2      \x1b[0m\x1b[?25l\x1b[?2026l",
		);
		assert.deepStrictEqual(terminal.getViewport(), ["top2", "", "", "bottom"]);
		tui.stop();
	});

	it("places the hardware cursor at the marker", async () => {
		const { terminal, tui, body } = setup();
		body.lines = [`ab${CURSOR_MARKER}c`];
		tui.start();
		await flushRender();

		assert.deepStrictEqual(terminal.getCursorPosition(), { row: 0, col: 2 });
		assert.strictEqual(terminal.cursorVisible, true);
		assert.strictEqual(terminal.getViewport()[0], "abc");
		tui.stop();
	});

	it("routes input through listeners before the focused component", () => {
		const { terminal, tui, body } = setup();
		tui.setFocus(body);
		assert.strictEqual(body.focused, true);
		tui.start();

		const seen: string[] = [];
		const remove = tui.addInputListener((data) => {
			seen.push(data);
			return data === "q" ? { consume: true } : undefined;
		});
		terminal.sendInput("q");
		terminal.sendInput("x");
		remove();
		terminal.sendInput("y");

		assert.deepStrictEqual(seen, ["q", "x"]);
		assert.deepStrictEqual(body.received, ["x", "y"]);
		tui.stop();
	});

	it("re-lays out and invalidates components on resize", async () => {
		const { terminal, tui, body } = setup();
		tui.start();
		await flushRender();

		terminal.resize(20, 3);
		await flushRender();

		assert.deepStrictEqual(body.size, { width: 20, height: 2 });
		assert.strictEqual(body.invalidations, 1);
		assert.deepStrictEqual(terminal.getViewport(), ["top", "", "bottom"]);
		assert.strictEqual(tui.fullRedraws, 2);
		tui.stop();
	});

	it("restores the terminal on stop", () => {
		const { terminal, tui } = setup();
		tui.start();
		assert.strictEqual(terminal.started, true);
		tui.stop();
		assert.strictEqual(terminal.started, false);
		assert.strictEqual(terminal.cursorVisible, true);
		assert.strictEqual(tui.isRunning(), false);
	});
});
