/**
 * @file 文档行
 *
 * Line 持有一行文本，并惰性地构建、缓存它的片段序列。
 * 所有修改操作都会使缓存失效，下次读取时重建。
 *
 * 索引约定：
 * - 字位索引从 0 开始，i 表示第 i 个字位簇之前的位置
 * - 偏移为 UTF-16 码元偏移
 * - 列为显示列
 * 所有索引参数都会被钳制到有效范围内，不会抛出异常。
 */

import type { Annotation } from "../annotation/annotation.js";
import { AnnotatedStringIterator } from "../annotation/annotated-string-iterator.js";
import type { ColumnRange } from "../types.js";
import { fragmentEnd, type TextFragment, textFragmentsOf } from "./text-fragment.js";

/** 行内的一处查找结果 */
export interface LineMatch {
	/** 匹配起点的字位索引 */
	graphemeIndex: number;
	/** 匹配起点的偏移 */
	offset: number;
}

export class Line {
	private text: string;
	private cachedFragments: TextFragment[] | undefined;

	constructor(text = "") {
		this.text = text;
	}

	static from(text: string): Line {
		return new Line(text);
	}

	/** 片段序列（缓存失效时重建） */
	get fragments(): readonly TextFragment[] {
		if (this.cachedFragments === undefined) {
			this.cachedFragments = textFragmentsOf(this.text);
		}
		return this.cachedFragments;
	}

	/** 文本长度（UTF-16 码元） */
	get length(): number {
		return this.text.length;
	}

	toString(): string {
		return this.text;
	}

	isEmpty(): boolean {
		return this.text.length === 0;
	}

	graphemeCount(): number {
		return this.fragments.length;
	}

	/** 整行的显示宽度 */
	width(): number {
		return this.widthUntil(this.graphemeCount());
	}

	/** 字位索引之前所有片段的宽度之和，即该索引所在的显示列 */
	widthUntil(graphemeIndex: number): number {
		const fragments = this.fragments;
		const stop = Math.min(Math.max(0, graphemeIndex), fragments.length);
		let width = 0;
		for (let i = 0; i < stop; i++) {
			width += fragments[i]?.width ?? 0;
		}
		return width;
	}

	/** 列不超过 column 的最大字位边界 */
	graphemeIndexAtColumn(column: number): number {
		let width = 0;
		let index = 0;
		for (const fragment of this.fragments) {
			if (width + fragment.width > column) {
				break;
			}
			width += fragment.width;
			index++;
		}
		return index;
	}

	/** 字位索引对应的偏移，越界时返回行尾 */
	offsetOfGrapheme(graphemeIndex: number): number {
		if (graphemeIndex <= 0) {
			return 0;
		}
		return this.fragments[graphemeIndex]?.start ?? this.text.length;
	}

	/** 包含该偏移的字位索引，越界时返回字位数 */
	graphemeIndexAtOffset(offset: number): number {
		if (offset <= 0) {
			return 0;
		}
		const fragments = this.fragments;
		for (let i = 0; i < fragments.length; i++) {
			const fragment = fragments[i];
			if (fragment && offset < fragmentEnd(fragment)) {
				return i;
			}
		}
		return fragments.length;
	}

	/** 偏移是否位于字位簇边界上 */
	isGraphemeBoundary(offset: number): boolean {
		if (offset === 0 || offset === this.text.length) {
			return true;
		}
		return this.fragments.some((fragment) => fragment.start === offset);
	}

	/** 在字位索引处插入文本 */
	insert(graphemeIndex: number, text: string): void {
		const offset = this.offsetOfGrapheme(graphemeIndex);
		this.setText(this.text.slice(0, offset) + text + this.text.slice(offset));
	}

	/** 在行尾追加文本 */
	appendText(text: string): void {
		this.setText(this.text + text);
	}

	/** 追加另一行的文本 */
	append(other: Line): void {
		this.appendText(other.text);
	}

	/** 删除字位索引处的字位簇，越界时不做任何事 */
	delete(graphemeIndex: number): void {
		if (graphemeIndex < 0) {
			return;
		}
		const fragment = this.fragments[graphemeIndex];
		if (!fragment) {
			return;
		}
		this.setText(this.text.slice(0, fragment.start) + this.text.slice(fragmentEnd(fragment)));
	}

	/** 删除最后一个字位簇 */
	deleteLast(): void {
		this.delete(this.graphemeCount() - 1);
	}

	/** 删除 [from, to) 字位区间 */
	deleteRange(fromGrapheme: number, toGrapheme: number): void {
		const from = this.offsetOfGrapheme(fromGrapheme);
		const to = this.offsetOfGrapheme(toGrapheme);
		if (to <= from) {
			return;
		}
		this.setText(this.text.slice(0, from) + this.text.slice(to));
	}

	/** 在字位索引处拆分：返回尾部的新行，本行截断为头部 */
	splitAt(graphemeIndex: number): Line {
		const offset = this.offsetOfGrapheme(graphemeIndex);
		const tail = new Line(this.text.slice(offset));
		this.setText(this.text.slice(0, offset));
		return tail;
	}

	/**
	 * 查找偏移区间内所有字面匹配（区分大小写、不重叠），
	 * 只保留起止都落在字位簇边界上的匹配。
	 */
	findAll(query: string, range: { start: number; end: number } = { start: 0, end: this.text.length }): LineMatch[] {
		if (query.length === 0) {
			return [];
		}
		const start = Math.max(0, range.start);
		const end = Math.min(this.text.length, range.end);
		const matches: LineMatch[] = [];

		let offset = this.text.indexOf(query, start);
		while (offset !== -1 && offset + query.length <= end) {
			if (this.isGraphemeBoundary(offset) && this.isGraphemeBoundary(offset + query.length)) {
				matches.push({ graphemeIndex: this.graphemeIndexAtOffset(offset), offset });
				offset = this.text.indexOf(query, offset + query.length);
			} else {
				offset = this.text.indexOf(query, offset + 1);
			}
		}
		return matches;
	}

	/** 从字位索引（含）向后查找第一个匹配，返回其字位索引 */
	searchForward(query: string, fromGrapheme: number): number | undefined {
		const start = this.offsetOfGrapheme(fromGrapheme);
		return this.findAll(query, { start, end: this.text.length })[0]?.graphemeIndex;
	}

	/** 查找完全位于字位索引之前的最后一个匹配，返回其字位索引 */
	searchBackward(query: string, fromGrapheme: number): number | undefined {
		const end = this.offsetOfGrapheme(fromGrapheme);
		const matches = this.findAll(query, { start: 0, end });
		return matches[matches.length - 1]?.graphemeIndex;
	}

	/** 窗口内可见的纯文本（不补齐宽度） */
	visibleText(range: ColumnRange): string {
		return new AnnotatedStringIterator(this.fragments, range, [], { padToWindow: false }).toString();
	}

	/** 窗口内带注解的渲染片段，恰好覆盖窗口宽度 */
	spans(range: ColumnRange, annotations: readonly Annotation[] = []): AnnotatedStringIterator {
		return new AnnotatedStringIterator(this.fragments, range, annotations);
	}

	private setText(text: string): void {
		this.text = text;
		this.cachedFragments = undefined;
	}
}
