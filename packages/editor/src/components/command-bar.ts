/**
 * @file 命令栏
 *
 * 提示符加一行输入。输入值放不下时只显示能放下的末尾部分。
 */

import { type Component, CURSOR_MARKER, type Focusable, visibleWidth } from "@glyph-editor/tui";
import type { EditCommand } from "../commands.js";
import { Line } from "../line/line.js";
import { defaultTheme, type EditorTheme } from "../theme.js";
import type { Size } from "../types.js";

export class CommandBar implements Component, Focusable {
	focused = false;

	private prompt = "";
	private value = new Line();
	private width = 0;

	constructor(private readonly theme: EditorTheme = defaultTheme) {}

	setPrompt(prompt: string): void {
		this.prompt = prompt;
	}

	getPrompt(): string {
		return this.prompt;
	}

	getValue(): string {
		return this.value.toString();
	}

	clearValue(): void {
		this.value = new Line();
	}

	/** 只处理插入与退格，其他编辑命令被忽略 */
	handleEditCommand(command: EditCommand): void {
		switch (command.action) {
			case "insert":
				this.value.appendText(command.text.replace(/[\r\n]/g, ""));
				break;
			case "deleteBackward":
				this.value.deleteLast();
				break;
			case "newline":
			case "delete":
				break;
		}
	}

	/** 光标所在列：提示符与输入值之后，不超过栏宽 */
	caretColumn(): number {
		return Math.min(visibleWidth(this.prompt) + this.value.width(), this.width);
	}

	/** 可见部分的纯文本 */
	visibleText(): string {
		const available = Math.max(0, this.width - visibleWidth(this.prompt));
		const end = this.value.width();
		const start = Math.max(0, end - available);
		const text = `${this.prompt}${this.value.visibleText({ start, end })}`;
		return visibleWidth(text) <= this.width ? text : "";
	}

	resize(size: Size): void {
		this.width = size.width;
	}

	invalidate(): void {
		// Rendered from the current value every time
	}

	render(): string[] {
		const text = this.visibleText();
		if (text.length === 0) {
			return [""];
		}
		const prompt = text.slice(0, this.prompt.length);
		const rest = text.slice(this.prompt.length);
		return [this.theme.prompt(prompt) + rest + (this.focused ? CURSOR_MARKER : "")];
	}
}
