/**
 * @file 文本片段
 *
 * 片段是渲染的最小单位：一个字位簇、它解析后的显示宽度、
 * 可选的替代字形，以及它在所属行文本中的起始偏移（UTF-16 码元）。
 */

import { getSegmenter, isControlGrapheme } from "@glyph-editor/tui";
import { graphemeDisplayWidth } from "./grapheme-width.js";

export interface TextFragment {
	/** 原始字位簇 */
	grapheme: string;
	/** 渲染宽度，替换后永不为 0 */
	width: 1 | 2;
	/** 代替原字位簇显示的字形 */
	replacement?: string;
	/** 在行文本中的起始偏移 */
	start: number;
}

/** 片段在行文本中的结束偏移（不含） */
export function fragmentEnd(fragment: TextFragment): number {
	return fragment.start + fragment.grapheme.length;
}

/** 片段实际显示的文本 */
export function fragmentText(fragment: TextFragment): string {
	return fragment.replacement ?? fragment.grapheme;
}

/** 为不可见或零宽的字位簇选择替代字形 */
function replacementFor(cluster: string, width: number): string | undefined {
	if (cluster === " ") {
		return undefined;
	}
	if (cluster === "\t") {
		return " ";
	}
	if (width > 0 && cluster.trim() === "") {
		return "␣";
	}
	if (width === 0) {
		return isControlGrapheme(cluster) ? "▯" : "·";
	}
	return undefined;
}

/** 将一行文本切分为片段序列 */
export function textFragmentsOf(text: string): TextFragment[] {
	const fragments: TextFragment[] = [];
	for (const { segment, index } of getSegmenter().segment(text)) {
		const width = graphemeDisplayWidth(segment);
		const replacement = replacementFor(segment, width);
		if (replacement !== undefined) {
			fragments.push({ grapheme: segment, width: 1, replacement, start: index });
		} else {
			fragments.push({ grapheme: segment, width: width === 2 ? 2 : 1, start: index });
		}
	}
	return fragments;
}
