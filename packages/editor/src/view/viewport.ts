/**
 * @file 视口投影
 *
 * 把文档投影到一个 height 行 × width 列的窗口：每个可见行要么是一行文档的
 * 渲染片段序列（恰好 width 列宽），要么是文档之外的填充行。
 * 另外提供让光标保持可见、以及让位置居中的滚动计算。
 */

import type { Annotation } from "../annotation/annotation.js";
import type { AnnotatedStringIterator } from "../annotation/annotated-string-iterator.js";
import type { Line } from "../line/line.js";
import type { LineSource, Position, Size, Viewport } from "../types.js";

export type VisibleRow =
	| { kind: "line"; lineIndex: number; spans: AnnotatedStringIterator }
	| { kind: "filler"; lineIndex: number };

/** 提供某一行注解的回调 */
export type AnnotationProvider = (lineIndex: number, line: Line) => readonly Annotation[];

/** 逐行投影视口 */
export function* projectViewport(
	document: LineSource,
	viewport: Viewport,
	annotationsFor: AnnotationProvider = () => [],
): Generator<VisibleRow> {
	const range = { start: viewport.left, end: viewport.left + Math.max(0, viewport.width) };
	for (let row = 0; row < viewport.height; row++) {
		const lineIndex = viewport.top + row;
		const line = document.lines[lineIndex];
		if (line) {
			yield { kind: "line", lineIndex, spans: line.spans(range, annotationsFor(lineIndex, line)) };
		} else {
			yield { kind: "filler", lineIndex };
		}
	}
}

/** 调整滚动位置，使文档坐标 target（行、显示列）落在窗口内 */
export function scrollToReveal(scroll: Position, target: Position, size: Size): Position {
	let { row, col } = scroll;
	if (target.row < row) {
		row = target.row;
	} else if (target.row >= row + size.height) {
		row = target.row - size.height + 1;
	}
	if (target.col < col) {
		col = target.col;
	} else if (target.col >= col + size.width) {
		col = target.col - size.width + 1;
	}
	return { row: Math.max(0, row), col: Math.max(0, col) };
}

/** 使 target 位于窗口中央的滚动位置 */
export function centerOn(target: Position, size: Size): Position {
	return {
		row: Math.max(0, target.row - Math.floor(size.height / 2)),
		col: Math.max(0, target.col - Math.floor(size.width / 2)),
	};
}
