/**
 * @file 编辑器命令
 *
 * 将按键输入翻译为编辑器命令：移动、编辑、系统命令。
 */

import { type EditorAction, type EditorKeybindingsManager, extractPaste, isPrintable } from "@glyph-editor/tui";

export type MoveDirection = "up" | "down" | "left" | "right" | "pageUp" | "pageDown" | "lineStart" | "lineEnd";

export interface MoveCommand {
	kind: "move";
	direction: MoveDirection;
	/** 是否扩展选区 */
	extend: boolean;
}

export type EditCommand =
	| { kind: "edit"; action: "insert"; text: string }
	| { kind: "edit"; action: "newline" }
	| { kind: "edit"; action: "delete" }
	| { kind: "edit"; action: "deleteBackward" };

export interface SystemCommand {
	kind: "system";
	action: "save" | "quit" | "search" | "dismiss";
}

export type Command = MoveCommand | EditCommand | SystemCommand;

function move(direction: MoveDirection, extend = false): MoveCommand {
	return { kind: "move", direction, extend };
}

/** 动作到命令的映射 */
const ACTION_COMMANDS: Record<EditorAction, Command> = {
	cursorUp: move("up"),
	cursorDown: move("down"),
	cursorLeft: move("left"),
	cursorRight: move("right"),
	cursorLineStart: move("lineStart"),
	cursorLineEnd: move("lineEnd"),
	pageUp: move("pageUp"),
	pageDown: move("pageDown"),
	selectUp: move("up", true),
	selectDown: move("down", true),
	selectLeft: move("left", true),
	selectRight: move("right", true),
	deleteCharBackward: { kind: "edit", action: "deleteBackward" },
	deleteCharForward: { kind: "edit", action: "delete" },
	newLine: { kind: "edit", action: "newline" },
	save: { kind: "system", action: "save" },
	quit: { kind: "system", action: "quit" },
	search: { kind: "system", action: "search" },
	dismiss: { kind: "system", action: "dismiss" },
};

/** 解析一个输入序列；无法识别时返回 undefined */
export function commandFromInput(data: string, keybindings: EditorKeybindingsManager): Command | undefined {
	const action = keybindings.resolve(data);
	if (action !== undefined) {
		return ACTION_COMMANDS[action];
	}

	const pasted = extractPaste(data);
	if (pasted !== undefined) {
		return pasted.length > 0 ? { kind: "edit", action: "insert", text: pasted } : undefined;
	}

	if (data === "\t") {
		return { kind: "edit", action: "insert", text: "\t" };
	}
	if (isPrintable(data)) {
		return { kind: "edit", action: "insert", text: data };
	}
	return undefined;
}
