/**
 * @file 字位簇显示宽度
 */

import { graphemeWidth } from "@glyph-editor/tui";

/** 一个字位簇占用的终端列数 */
export type GraphemeWidth = 0 | 1 | 2;

/**
 * 计算单个字位簇的显示宽度。
 * 零宽字符（默认可忽略、控制字符、组合记号、代理项）为 0，
 * Emoji 与东亚宽字符为 2，其余可打印字符（包括未分配码点）为 1。
 */
export function graphemeDisplayWidth(cluster: string): GraphemeWidth {
	return graphemeWidth(cluster);
}
