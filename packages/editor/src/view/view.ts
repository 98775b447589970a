/**
 * @file 文档视图
 *
 * View 是编辑区组件：持有文档缓冲区、光标、滚动位置、查找引擎和选区，
 * 执行移动与编辑命令，并把视口投影渲染为终端行。
 *
 * 光标的 lineIndex 取值范围是 [0, lineCount]，等于 lineCount 时位于
 * 文档末尾之后的虚拟空行上。
 */

import {
	type Component,
	CURSOR_MARKER,
	type Focusable,
	graphemeWidth,
	segmentGraphemes,
} from "@glyph-editor/tui";
import type { Annotation } from "../annotation/annotation.js";
import type { AnnotatedStringPart } from "../annotation/annotated-string-iterator.js";
import type { EditCommand, MoveCommand, MoveDirection } from "../commands.js";
import type { DocumentStatus } from "../document-status.js";
import type { Line } from "../line/line.js";
import { SearchEngine } from "../search/search-engine.js";
import { defaultTheme, type EditorTheme } from "../theme.js";
import type { Location, Position, Size } from "../types.js";
import { Buffer } from "./buffer.js";
import { Selection } from "./selection.js";
import { centerOn, projectViewport, scrollToReveal } from "./viewport.js";

export interface ViewOptions {
	theme?: EditorTheme;
	/** 空文档时显示的欢迎信息 */
	welcomeMessage?: string;
}

/** 把欢迎信息居中放在 "~" 之后；放不下时只显示 "~" */
export function buildWelcomeLine(message: string, width: number): string {
	if (width <= 0) {
		return "";
	}
	const available = width - 1;
	if (available < message.length) {
		return "~";
	}
	const padding = available - message.length;
	const left = Math.floor(padding / 2);
	return `~${" ".repeat(left)}${message}${" ".repeat(padding - left)}`;
}

export class View implements Component, Focusable {
	focused = false;

	private buffer: Buffer;
	private cursor: Location = { lineIndex: 0, graphemeIndex: 0 };
	private scroll: Position = { row: 0, col: 0 };
	private size: Size = { width: 0, height: 0 };
	private selection: Selection | undefined;
	private readonly theme: EditorTheme;
	private readonly welcomeMessage: string;

	readonly search = new SearchEngine();

	constructor(buffer: Buffer = new Buffer(), options: ViewOptions = {}) {
		this.buffer = buffer;
		this.theme = options.theme ?? defaultTheme;
		this.welcomeMessage = options.welcomeMessage ?? "";
	}

	// =========================================================================
	// 文档
	// =========================================================================

	getBuffer(): Buffer {
		return this.buffer;
	}

	/** 换入新的文档，光标和滚动回到起点 */
	setBuffer(buffer: Buffer): void {
		this.buffer = buffer;
		this.cursor = { lineIndex: 0, graphemeIndex: 0 };
		this.scroll = { row: 0, col: 0 };
		this.selection = undefined;
		this.search.commit();
	}

	getCursor(): Location {
		return { ...this.cursor };
	}

	getScroll(): Position {
		return { ...this.scroll };
	}

	getSelection(): Selection | undefined {
		return this.selection;
	}

	getStatus(): DocumentStatus {
		return {
			totalLines: this.buffer.lineCount(),
			currentLineIndex: this.cursor.lineIndex,
			isModified: this.buffer.isDirty,
			fileName: this.buffer.fileInfo.displayName,
		};
	}

	/** 光标在屏幕上的位置（相对视图左上角） */
	caretPosition(): Position {
		const caret = this.caretInDocument();
		return { row: caret.row - this.scroll.row, col: caret.col - this.scroll.col };
	}

	// =========================================================================
	// 命令
	// =========================================================================

	handleCommand(command: MoveCommand | EditCommand): void {
		if (command.kind === "move") {
			this.move(command.direction, command.extend);
			return;
		}
		switch (command.action) {
			case "insert":
				this.insertText(command.text);
				break;
			case "newline":
				this.insertNewline();
				break;
			case "delete":
				this.deleteForward();
				break;
			case "deleteBackward":
				this.deleteBackward();
				break;
		}
	}

	/** 移动光标；extend 为 true 时扩展选区，否则取消选区 */
	move(direction: MoveDirection, extend = false): void {
		if (extend && !this.selection) {
			this.selection = new Selection({ ...this.cursor }, { ...this.cursor });
		} else if (!extend) {
			this.selection = undefined;
		}

		const pageStep = Math.max(1, this.size.height - 1);
		switch (direction) {
			case "up":
				this.moveVertically(-1);
				break;
			case "down":
				this.moveVertically(1);
				break;
			case "pageUp":
				this.moveVertically(-pageStep);
				break;
			case "pageDown":
				this.moveVertically(pageStep);
				break;
			case "left":
				this.moveLeft();
				break;
			case "right":
				this.moveRight();
				break;
			case "lineStart":
				this.cursor = { lineIndex: this.cursor.lineIndex, graphemeIndex: 0 };
				break;
			case "lineEnd":
				this.cursor = { lineIndex: this.cursor.lineIndex, graphemeIndex: this.graphemeCountAt(this.cursor.lineIndex) };
				break;
		}

		if (this.selection) {
			this.selection.head = { ...this.cursor };
		}
		this.scrollToCaret();
	}

	insertText(text: string): void {
		this.deleteSelection();
		this.cursor = this.buffer.insertText(text, this.cursor);
		this.scrollToCaret();
	}

	insertNewline(): void {
		this.deleteSelection();
		this.buffer.insertNewline(this.cursor);
		this.cursor = { lineIndex: this.cursor.lineIndex + 1, graphemeIndex: 0 };
		this.scrollToCaret();
	}

	/** 删除光标处的字位簇（或选区） */
	deleteForward(): void {
		if (this.deleteSelection()) {
			this.scrollToCaret();
			return;
		}
		this.buffer.delete(this.cursor);
	}

	/** 删除光标前的字位簇（或选区）；位于文档开头时不做任何事 */
	deleteBackward(): void {
		if (this.deleteSelection()) {
			this.scrollToCaret();
			return;
		}
		if (this.cursor.lineIndex === 0 && this.cursor.graphemeIndex === 0) {
			return;
		}
		this.moveLeft();
		this.buffer.delete(this.cursor);
		this.scrollToCaret();
	}

	/** 删除非空选区，光标移到选区起点；返回是否删除了内容 */
	private deleteSelection(): boolean {
		const selection = this.selection;
		this.selection = undefined;
		if (!selection || selection.isEmpty()) {
			return false;
		}
		const start = selection.start;
		this.buffer.deleteRange(start, selection.end);
		this.cursor = { ...start };
		return true;
	}

	private graphemeCountAt(lineIndex: number): number {
		return this.buffer.getLine(lineIndex)?.graphemeCount() ?? 0;
	}

	private moveVertically(delta: number): void {
		const column = this.caretInDocument().col;
		const lineIndex = Math.min(Math.max(0, this.cursor.lineIndex + delta), this.buffer.lineCount());
		const line = this.buffer.getLine(lineIndex);
		this.cursor = { lineIndex, graphemeIndex: line ? line.graphemeIndexAtColumn(column) : 0 };
	}

	private moveLeft(): void {
		if (this.cursor.graphemeIndex > 0) {
			const graphemeIndex = Math.max(0, Math.min(this.cursor.graphemeIndex, this.graphemeCountAt(this.cursor.lineIndex)) - 1);
			this.cursor = { lineIndex: this.cursor.lineIndex, graphemeIndex };
		} else if (this.cursor.lineIndex > 0) {
			const lineIndex = this.cursor.lineIndex - 1;
			this.cursor = { lineIndex, graphemeIndex: this.graphemeCountAt(lineIndex) };
		}
	}

	private moveRight(): void {
		if (this.cursor.graphemeIndex < this.graphemeCountAt(this.cursor.lineIndex)) {
			this.cursor = { lineIndex: this.cursor.lineIndex, graphemeIndex: this.cursor.graphemeIndex + 1 };
		} else if (this.cursor.lineIndex < this.buffer.lineCount()) {
			this.cursor = { lineIndex: this.cursor.lineIndex + 1, graphemeIndex: 0 };
		}
	}

	// =========================================================================
	// 查找
	// =========================================================================

	enterSearch(): void {
		this.selection = undefined;
		this.search.enter(this.cursor, this.scroll);
	}

	/** 更新查询串，从光标处起跳到新的当前匹配 */
	setSearchQuery(query: string): void {
		this.jumpTo(this.search.setQuery(query, this.buffer, this.cursor));
	}

	searchNext(): void {
		this.jumpTo(this.search.next());
	}

	searchPrevious(): void {
		this.jumpTo(this.search.previous());
	}

	/** 确认查找，光标留在当前匹配处 */
	commitSearch(): void {
		this.search.commit();
	}

	/** 取消查找，恢复进入查找前的光标与滚动位置 */
	cancelSearch(): void {
		const snapshot = this.search.cancel();
		if (snapshot) {
			this.cursor = snapshot.location;
			this.scroll = snapshot.scroll;
		}
	}

	private jumpTo(location: Location | undefined): void {
		if (!location) {
			return;
		}
		this.cursor = location;
		this.scroll = centerOn(this.caretInDocument(), this.size);
	}

	// =========================================================================
	// 滚动
	// =========================================================================

	/** 光标的文档坐标（行、显示列） */
	private caretInDocument(): Position {
		const line = this.buffer.getLine(this.cursor.lineIndex);
		return { row: this.cursor.lineIndex, col: line ? line.widthUntil(this.cursor.graphemeIndex) : 0 };
	}

	private scrollToCaret(): void {
		if (this.size.width <= 0 || this.size.height <= 0) {
			return;
		}
		this.scroll = scrollToReveal(this.scroll, this.caretInDocument(), this.size);
	}

	// =========================================================================
	// Component
	// =========================================================================

	resize(size: Size): void {
		this.size = size;
		this.scrollToCaret();
	}

	invalidate(): void {
		// Nothing cached: every render reads the buffer
	}

	private annotationsFor(lineIndex: number, line: Line): Annotation[] {
		const annotations = this.search.annotationsForLine(lineIndex);
		if (this.selection) {
			annotations.push(...this.selection.annotationsForLine(lineIndex, line));
		}
		return annotations;
	}

	render(): string[] {
		const { width, height } = this.size;
		if (width <= 0 || height <= 0) {
			return [];
		}

		const caret = this.focused ? this.caretPosition() : undefined;
		const welcomeRow = Math.floor(height / 3);
		const rows = projectViewport(
			this.buffer,
			{ top: this.scroll.row, left: this.scroll.col, height, width },
			(lineIndex, line) => this.annotationsFor(lineIndex, line),
		);

		const lines: string[] = [];
		let row = 0;
		for (const visible of rows) {
			const markerColumn = caret && caret.row === row ? caret.col : undefined;
			if (visible.kind === "line") {
				lines.push(this.renderParts(visible.spans, markerColumn));
			} else {
				const text =
					this.buffer.isEmpty() && row === welcomeRow && this.welcomeMessage
						? this.theme.welcome(buildWelcomeLine(this.welcomeMessage, width))
						: this.theme.filler("~");
				lines.push(markerColumn === undefined ? text : CURSOR_MARKER + text);
			}
			row++;
		}
		return lines;
	}

	/** 把渲染片段拼成一行，并在 markerColumn 处插入光标标记 */
	private renderParts(parts: Iterable<AnnotatedStringPart>, markerColumn: number | undefined): string {
		let result = "";
		let column = 0;
		for (const part of parts) {
			const style = part.type ? this.theme.annotation[part.type] : (text: string) => text;
			if (markerColumn !== undefined && markerColumn >= column && markerColumn < column + part.width) {
				const [before, after] = splitAtColumn(part.text, markerColumn - column);
				result += (before ? style(before) : "") + CURSOR_MARKER + (after ? style(after) : "");
			} else {
				result += style(part.text);
			}
			column += part.width;
		}
		if (markerColumn !== undefined && markerColumn >= column) {
			result += CURSOR_MARKER;
		}
		return result;
	}
}

/** 在显示列处把文本分成两段 */
function splitAtColumn(text: string, column: number): [string, string] {
	let width = 0;
	for (const { segment, index } of segmentGraphemes(text)) {
		if (width >= column) {
			return [text.slice(0, index), text.slice(index)];
		}
		width += Math.max(1, graphemeWidth(segment));
	}
	return [text, ""];
}
