/**
 * @file 编辑器共享类型
 */

import type { Position, Size } from "@glyph-editor/tui";
import type { Line } from "./line/line.js";

export type { Position, Size };

/** 文档坐标中的光标位置：行索引 + 行内字位索引（均从 0 开始） */
export interface Location {
	lineIndex: number;
	graphemeIndex: number;
}

/** 投影窗口：文档中从 (top, left) 起、height 行 × width 列的可见区域 */
export interface Viewport {
	top: number;
	left: number;
	height: number;
	width: number;
}

/** 显示列的半开区间 [start, end) */
export interface ColumnRange {
	start: number;
	end: number;
}

/** 按文档阅读顺序比较两个位置 */
export function compareLocations(a: Location, b: Location): number {
	if (a.lineIndex !== b.lineIndex) {
		return a.lineIndex - b.lineIndex;
	}
	return a.graphemeIndex - b.graphemeIndex;
}

/** 提供文档各行的数据源 */
export interface LineSource {
	readonly lines: readonly Line[];
}
