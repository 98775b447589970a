import type { Terminal } from "../src/terminal.js";
import { graphemeWidth, segmentGraphemes } from "../src/utils.js";

/**
 * In-memory terminal for tests.
 * Interprets the subset of escape sequences TUI emits (cursor positioning,
 * line and screen clears) into a character grid; styling is discarded.
 */
export class VirtualTerminal implements Terminal {
	private cols: number;
	private rowCount: number;
	private grid: string[][] = [];
	private cursor = { row: 0, col: 0 };
	private inputHandler?: (data: string) => void;
	private resizeHandler?: () => void;

	/** Everything written since construction */
	output = "";
	cursorVisible = true;
	title = "";
	started = false;

	constructor(cols = 80, rows = 24) {
		this.cols = cols;
		this.rowCount = rows;
		this.clearGrid();
	}

	start(onInput: (data: string) => void, onResize: () => void): void {
		this.started = true;
		this.inputHandler = onInput;
		this.resizeHandler = onResize;
	}

	stop(): void {
		this.started = false;
		this.inputHandler = undefined;
		this.resizeHandler = undefined;
	}

	write(data: string): void {
		this.output += data;
		this.interpret(data);
	}

	get columns(): number {
		return this.cols;
	}

	get rows(): number {
		return this.rowCount;
	}

	hideCursor(): void {
		this.cursorVisible = false;
	}

	showCursor(): void {
		this.cursorVisible = true;
	}

	clearScreen(): void {
		this.clearGrid();
		this.cursor = { row: 0, col: 0 };
	}

	setTitle(title: string): void {
		this.title = title;
	}

	/** Simulate keyboard input */
	sendInput(data: string): void {
		this.inputHandler?.(data);
	}

	/** Simulate a terminal resize */
	resize(cols: number, rows: number): void {
		this.cols = cols;
		this.rowCount = rows;
		this.clearGrid();
		this.resizeHandler?.();
	}

	/** Screen rows with trailing blanks removed */
	getViewport(): string[] {
		return this.grid.map((row) => row.join("").trimEnd());
	}

	getCursorPosition(): { row: number; col: number } {
		return { ...this.cursor };
	}

	private clearGrid(): void {
		this.grid = Array.from({ length: this.rowCount }, () => Array<string>(this.cols).fill(" "));
	}

	private interpret(data: string): void {
		let i = 0;
		while (i < data.length) {
			if (data[i] === "\x1b") {
				i = this.interpretEscape(data, i);
				continue;
			}
			let end = data.indexOf("\x1b", i);
			if (end === -1) end = data.length;
			this.print(data.slice(i, end));
			i = end;
		}
	}

	private interpretEscape(data: string, start: number): number {
		const kind = data[start + 1];
		if (kind === "[") {
			const match = /^\x1b\[([?\d;]*)([A-Za-z~])/.exec(data.slice(start));
			if (!match) return data.length;
			const params = match[1] ?? "";
			const final = match[2];
			if (final === "H") {
				const [row, col] = params.split(";").map((p) => Number(p || "1"));
				this.cursor = { row: (row ?? 1) - 1, col: (col ?? 1) - 1 };
			} else if (final === "K" && params === "2") {
				const row = this.grid[this.cursor.row];
				if (row) row.fill(" ");
			} else if (final === "J" && params === "2") {
				this.clearGrid();
			} else if (params === "?25" && final === "h") {
				this.cursorVisible = true;
			} else if (params === "?25" && final === "l") {
				this.cursorVisible = false;
			}
			return start + match[0].length;
		}
		if (kind === "]" || kind === "_") {
			const bel = data.indexOf("\x07", start);
			return bel === -1 ? data.length : bel + 1;
		}
		return start + 2;
	}

	private print(text: string): void {
		for (const { segment } of segmentGraphemes(text)) {
			const row = this.grid[this.cursor.row];
			if (!row) return;
			const width = graphemeWidth(segment);
			if (this.cursor.col < this.cols) {
				row[this.cursor.col] = segment;
				if (width === 2 && this.cursor.col + 1 < this.cols) {
					row[this.cursor.col + 1] = "";
				}
			}
			this.cursor.col += Math.max(1, width);
		}
	}
}

/** Wait for renders scheduled with process.nextTick */
export function flushRender(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}
