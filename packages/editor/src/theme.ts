/**
 * @file 主题
 *
 * 各 UI 元素的样式函数，默认实现基于 chalk。
 */

import chalk from "chalk";
import type { AnnotationType } from "./annotation/annotation.js";

export interface EditorTheme {
	/** 各类高亮 */
	annotation: Record<AnnotationType, (text: string) => string>;
	/** 文档之外的填充行标记 */
	filler: (text: string) => string;
	/** 欢迎信息 */
	welcome: (text: string) => string;
	/** 状态栏（整行） */
	statusBar: (text: string) => string;
	/** 消息栏 */
	message: (text: string) => string;
	/** 命令栏提示符 */
	prompt: (text: string) => string;
}

export const defaultTheme: EditorTheme = {
	annotation: {
		match: (text) => chalk.white.bgRgb(211, 211, 211)(text),
		selectedMatch: (text) => chalk.white.bgRgb(255, 255, 153)(text),
		selection: (text) => chalk.inverse(text),
	},
	filler: (text) => chalk.dim(text),
	welcome: (text) => text,
	statusBar: (text) => chalk.inverse(text),
	message: (text) => text,
	prompt: (text) => chalk.bold(text),
};

/** 不带任何样式的主题 */
export const plainTheme: EditorTheme = {
	annotation: {
		match: (text) => text,
		selectedMatch: (text) => text,
		selection: (text) => text,
	},
	filler: (text) => text,
	welcome: (text) => text,
	statusBar: (text) => text,
	message: (text) => text,
	prompt: (text) => text,
};
