/**
 * @file TUI 框架入口文件
 *
 * 本文件是终端 UI 框架包的公共 API 入口点。
 * 从各个模块中重新导出所有公共接口、类型和类。
 *
 * 主要导出内容：
 * - 核心 TUI 类和组件接口（TUI、Component、Region）
 * - 键盘输入处理（parseKey、matchesKey、快捷键管理）
 * - 终端接口与实现
 * - 文本宽度工具函数
 */

// 快捷键绑定
export {
	DEFAULT_EDITOR_KEYBINDINGS,
	EDITOR_ACTIONS,
	type EditorAction,
	type EditorKeybindingsConfig,
	EditorKeybindingsManager,
} from "./keybindings.js";
// 按键解析
export { extractPaste, isPrintable, type KeyId, matchesKey, normalizeKeyId, parseKey } from "./keys.js";
// 输入缓冲
export { StdinBuffer, type StdinBufferEventMap, type StdinBufferOptions } from "./stdin-buffer.js";
// 终端接口
export { ProcessTerminal, type Terminal } from "./terminal.js";
// 核心 TUI
export {
	type Component,
	CURSOR_MARKER,
	type Focusable,
	type InputListener,
	type InputListenerResult,
	isFocusable,
	layoutRegions,
	type Position,
	type Region,
	type Size,
	TUI,
} from "./tui.js";
// 工具函数
export {
	getSegmenter,
	graphemeWidth,
	isControlGrapheme,
	padToWidth,
	segmentGraphemes,
	stripAnsi,
	truncateToWidth,
	visibleWidth,
} from "./utils.js";
