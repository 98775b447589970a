/**
 * @file 带注解的字符串迭代器
 *
 * 对一行的片段序列、一个显示列窗口和一组注解，
 * 按需生成覆盖该窗口的渲染片段（文本 + 高亮类型）：
 * 1. 裁剪到窗口，跨越窗口边界的片段渲染为 1 列宽的空格占位
 * 2. 每个片段取与其偏移区间重叠的最高优先级注解
 * 3. 相邻的同样式片段合并
 * 4. 行比窗口短时，用无样式空格补足窗口宽度
 *
 * 每次调用 [Symbol.iterator]() 都从头开始。
 */

import { fragmentEnd, fragmentText, type TextFragment } from "../line/text-fragment.js";
import type { ColumnRange } from "../types.js";
import { type Annotation, type AnnotationType, dominantAnnotation } from "./annotation.js";

export interface AnnotatedStringPart {
	text: string;
	/** 显示列数 */
	width: number;
	type?: AnnotationType;
}

export interface AnnotatedStringIteratorOptions {
	/** 行结束后是否用空格补足窗口宽度（默认 true） */
	padToWindow?: boolean;
}

function makePart(text: string, width: number, type: AnnotationType | undefined): AnnotatedStringPart {
	return type === undefined ? { text, width } : { text, width, type };
}

export class AnnotatedStringIterator implements Iterable<AnnotatedStringPart> {
	private readonly padToWindow: boolean;

	constructor(
		private readonly fragments: readonly TextFragment[],
		private readonly range: ColumnRange,
		private readonly annotations: readonly Annotation[] = [],
		options: AnnotatedStringIteratorOptions = {},
	) {
		this.padToWindow = options.padToWindow ?? true;
	}

	/** 窗口宽度（列） */
	get width(): number {
		return Math.max(0, this.range.end - this.range.start);
	}

	*[Symbol.iterator](): Generator<AnnotatedStringPart> {
		const { start, end } = this.range;
		const windowWidth = this.width;
		if (windowWidth === 0) {
			return;
		}

		let pending: AnnotatedStringPart | undefined;
		let emittedWidth = 0;
		let column = 0;

		for (const fragment of this.fragments) {
			const fragmentStart = column;
			const fragmentStop = column + fragment.width;
			column = fragmentStop;
			if (fragmentStop <= start) {
				continue;
			}
			if (fragmentStart >= end) {
				break;
			}

			const type = dominantAnnotation(this.annotations, fragment.start, fragmentEnd(fragment));
			const clipped = fragmentStart < start || fragmentStop > end;
			const text = clipped ? " " : fragmentText(fragment);
			const width = clipped ? 1 : fragment.width;
			emittedWidth += width;

			if (pending && pending.type === type) {
				pending = makePart(pending.text + text, pending.width + width, type);
			} else {
				if (pending) {
					yield pending;
				}
				pending = makePart(text, width, type);
			}
		}

		if (this.padToWindow && emittedWidth < windowWidth) {
			const padding = windowWidth - emittedWidth;
			if (pending && pending.type === undefined) {
				pending = makePart(pending.text + " ".repeat(padding), pending.width + padding, undefined);
			} else {
				if (pending) {
					yield pending;
				}
				pending = makePart(" ".repeat(padding), padding, undefined);
			}
		}

		if (pending) {
			yield pending;
		}
	}

	/** 拼接所有片段的文本 */
	toString(): string {
		let text = "";
		for (const part of this) {
			text += part.text;
		}
		return text;
	}
}
