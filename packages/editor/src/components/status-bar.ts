/**
 * @file 状态栏
 *
 * 左侧为 "<文件名> - <n> lines (modified)"，右侧为 "<行>/<总行数>"，整行反色显示。
 * 内容放不下时显示空白行。
 */

import { type Component, padToWidth, visibleWidth } from "@glyph-editor/tui";
import { type DocumentStatus, lineCountText, modifiedIndicator, positionIndicator } from "../document-status.js";
import { defaultTheme, type EditorTheme } from "../theme.js";
import type { Size } from "../types.js";

/** 拼出状态栏文本；放不下时返回空串 */
export function formatStatus(status: DocumentStatus, width: number): string {
	const beginning = `${status.fileName} - ${lineCountText(status)} ${modifiedIndicator(status)}`;
	const position = positionIndicator(status);
	const gap = Math.max(0, width - visibleWidth(beginning) - visibleWidth(position));
	const text = `${beginning}${" ".repeat(gap)}${position}`;
	return visibleWidth(text) <= width ? text : "";
}

export class StatusBar implements Component {
	private status: DocumentStatus = { totalLines: 0, currentLineIndex: 0, isModified: false, fileName: "" };
	private width = 0;
	private cachedLines: string[] | undefined;

	constructor(private readonly theme: EditorTheme = defaultTheme) {}

	updateStatus(status: DocumentStatus): void {
		const current = this.status;
		if (
			current.totalLines === status.totalLines &&
			current.currentLineIndex === status.currentLineIndex &&
			current.isModified === status.isModified &&
			current.fileName === status.fileName
		) {
			return;
		}
		this.status = { ...status };
		this.invalidate();
	}

	resize(size: Size): void {
		this.width = size.width;
		this.invalidate();
	}

	invalidate(): void {
		this.cachedLines = undefined;
	}

	render(): string[] {
		if (!this.cachedLines) {
			const text = padToWidth(formatStatus(this.status, this.width), this.width);
			this.cachedLines = [this.theme.statusBar(text)];
		}
		return this.cachedLines;
	}
}
