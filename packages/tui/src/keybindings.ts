/**
 * @file 编辑器快捷键绑定管理
 *
 * 本文件定义了编辑器支持的所有动作类型（EditorAction），
 * 以及对应的默认快捷键绑定。用户可以通过 EditorKeybindingsConfig
 * 自定义快捷键映射。
 *
 * EditorKeybindingsManager 负责管理快捷键配置，支持：
 * - 基于默认配置的初始化
 * - 用户自定义配置的覆盖
 * - 输入数据与动作的匹配检查
 */

import { type KeyId, matchesKey, normalizeKeyId } from "./keys.js";

/**
 * 所有可绑定的编辑器动作。
 * 顺序即 resolve() 的匹配优先级。
 */
export const EDITOR_ACTIONS = [
	// 光标移动
	"cursorUp",
	"cursorDown",
	"cursorLeft",
	"cursorRight",
	"cursorLineStart",
	"cursorLineEnd",
	"pageUp",
	"pageDown",
	// 扩展选区
	"selectUp",
	"selectDown",
	"selectLeft",
	"selectRight",
	// 删除操作
	"deleteCharBackward",
	"deleteCharForward",
	// 文本输入
	"newLine",
	// 系统命令
	"save",
	"quit",
	"search",
	"dismiss",
] as const;

/**
 * 可绑定到快捷键的编辑器动作类型
 */
export type EditorAction = (typeof EDITOR_ACTIONS)[number];

export type { KeyId };

/**
 * 编辑器快捷键配置类型。
 * 每个动作可以绑定单个按键或多个按键。
 */
export type EditorKeybindingsConfig = {
	[K in EditorAction]?: KeyId | KeyId[];
};

/**
 * 默认编辑器快捷键绑定配置
 */
export const DEFAULT_EDITOR_KEYBINDINGS: Required<EditorKeybindingsConfig> = {
	// Cursor movement
	cursorUp: "up",
	cursorDown: "down",
	cursorLeft: "left",
	cursorRight: "right",
	cursorLineStart: ["home", "ctrl+a"],
	cursorLineEnd: ["end", "ctrl+e"],
	pageUp: "pageUp",
	pageDown: "pageDown",
	// Selection
	selectUp: "shift+up",
	selectDown: "shift+down",
	selectLeft: "shift+left",
	selectRight: "shift+right",
	// Deletion
	deleteCharBackward: "backspace",
	deleteCharForward: "delete",
	// Text input
	newLine: "enter",
	// System
	save: "ctrl+s",
	quit: "ctrl+q",
	search: "ctrl+f",
	dismiss: "escape",
};

/**
 * 编辑器快捷键管理器。
 * 管理动作到按键的映射，支持默认配置和用户自定义覆盖。
 */
export class EditorKeybindingsManager {
	/** 动作到按键数组的映射 */
	private actionToKeys: Map<EditorAction, KeyId[]>;

	constructor(config: EditorKeybindingsConfig = {}) {
		this.actionToKeys = new Map();
		this.buildMaps(config);
	}

	private buildMaps(config: EditorKeybindingsConfig): void {
		this.actionToKeys.clear();

		for (const action of EDITOR_ACTIONS) {
			// User config overrides defaults
			const keys = config[action] ?? DEFAULT_EDITOR_KEYBINDINGS[action];
			const keyArray = Array.isArray(keys) ? keys : [keys];
			this.actionToKeys.set(action, keyArray.map(normalizeKeyId));
		}
	}

	/**
	 * 检查输入是否匹配指定的动作。
	 */
	matches(data: string, action: EditorAction): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		for (const key of keys) {
			if (matchesKey(data, key)) return true;
		}
		return false;
	}

	/**
	 * 查找输入对应的第一个动作，没有绑定时返回 undefined。
	 */
	resolve(data: string): EditorAction | undefined {
		return EDITOR_ACTIONS.find((action) => this.matches(data, action));
	}

	/**
	 * 获取绑定到指定动作的所有按键。
	 */
	getKeys(action: EditorAction): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}

	/**
	 * 更新快捷键配置。
	 */
	setConfig(config: EditorKeybindingsConfig): void {
		this.buildMaps(config);
	}
}
