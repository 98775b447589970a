/**
 * @file 查找引擎
 *
 * 状态机：inactive → active → inactive（通过 commit 或 cancel）。
 * 每次查询变化都重新扫描整个文档；查找区分大小写，按字面匹配。
 */

import type { Annotation } from "../annotation/annotation.js";
import { Line } from "../line/line.js";
import type { LineSource, Location, Position } from "../types.js";
import { matchLocation, SearchInfo, type SearchMatch } from "./search-info.js";

export type SearchState = "inactive" | "active";

/** 进入查找前的光标与滚动位置 */
export interface SearchSnapshot {
	location: Location;
	scroll: Position;
}

/** 按文档顺序找出所有匹配 */
export function findMatches(document: LineSource, query: string): SearchMatch[] {
	const matches: SearchMatch[] = [];
	if (query.length === 0) {
		return matches;
	}
	document.lines.forEach((line, lineIndex) => {
		for (const match of line.findAll(query)) {
			matches.push({ lineIndex, graphemeIndex: match.graphemeIndex, offset: match.offset, length: query.length });
		}
	});
	return matches;
}

export class SearchEngine {
	private info: SearchInfo | undefined;

	get state(): SearchState {
		return this.info ? "active" : "inactive";
	}

	isActive(): boolean {
		return this.info !== undefined;
	}

	/** 当前查找会话（inactive 时为 undefined） */
	get searchInfo(): SearchInfo | undefined {
		return this.info;
	}

	get query(): string {
		return this.info?.query ?? "";
	}

	/** 进入查找：记录快照，查询与匹配集合为空 */
	enter(cursor: Location, scroll: Position): void {
		this.info = new SearchInfo({ ...cursor }, { ...scroll });
	}

	/**
	 * 设置查询串并重新扫描文档。
	 * 当前匹配取 from（通常是光标）处或其后的第一个匹配，未给出时从进入查找的位置算起。
	 * 返回新的当前匹配位置，没有匹配时返回 undefined。
	 */
	setQuery(query: string, document: LineSource, from?: Location): Location | undefined {
		const info = this.info;
		if (!info) {
			return undefined;
		}
		info.query = query;
		info.setMatches(findMatches(document, query), from ?? info.prevLocation);
		const current = info.current;
		return current ? matchLocation(current) : undefined;
	}

	/** 在查询串末尾追加文本 */
	appendToQuery(text: string, document: LineSource, from?: Location): Location | undefined {
		return this.setQuery(this.query + text, document, from);
	}

	/** 删除查询串的最后一个字位簇 */
	removeFromQuery(document: LineSource, from?: Location): Location | undefined {
		const query = new Line(this.query);
		query.deleteLast();
		return this.setQuery(query.toString(), document, from);
	}

	/** 循环前进到下一个匹配，返回其位置；没有匹配时返回 undefined */
	next(): Location | undefined {
		const match = this.info?.selectNext();
		return match ? matchLocation(match) : undefined;
	}

	/** 循环后退到上一个匹配 */
	previous(): Location | undefined {
		const match = this.info?.selectPrevious();
		return match ? matchLocation(match) : undefined;
	}

	/** 确认查找：光标停留在当前位置 */
	commit(): void {
		this.info = undefined;
	}

	/** 取消查找，返回需要恢复的快照 */
	cancel(): SearchSnapshot | undefined {
		const info = this.info;
		this.info = undefined;
		if (!info) {
			return undefined;
		}
		return { location: { ...info.prevLocation }, scroll: { ...info.prevScroll } };
	}

	/** 某一行的高亮：每个匹配为 match，当前匹配为 selectedMatch */
	annotationsForLine(lineIndex: number): Annotation[] {
		const info = this.info;
		if (!info) {
			return [];
		}
		const current = info.current;
		const annotations: Annotation[] = [];
		for (const match of info.matches) {
			if (match.lineIndex !== lineIndex) {
				continue;
			}
			const range = { start: match.offset, end: match.offset + match.length };
			annotations.push({ type: "match", ...range });
			if (match === current) {
				annotations.push({ type: "selectedMatch", ...range });
			}
		}
		return annotations;
	}
}
