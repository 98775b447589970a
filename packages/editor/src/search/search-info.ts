/**
 * @file 查找状态
 *
 * SearchInfo 记录一次查找会话的全部状态：查询串、按文档顺序排列的匹配、
 * 当前选中的匹配，以及进入查找时光标和滚动位置的快照。
 */

import { compareLocations, type Location, type Position } from "../types.js";

/** 文档中的一处匹配 */
export interface SearchMatch {
	lineIndex: number;
	/** 匹配起点的字位索引 */
	graphemeIndex: number;
	/** 匹配起点的偏移（UTF-16 码元） */
	offset: number;
	/** 匹配长度（UTF-16 码元） */
	length: number;
}

/** 匹配起点对应的光标位置 */
export function matchLocation(match: SearchMatch): Location {
	return { lineIndex: match.lineIndex, graphemeIndex: match.graphemeIndex };
}

export class SearchInfo {
	query = "";
	matches: SearchMatch[] = [];
	/** 当前匹配的索引，undefined 表示未选中 */
	currentIndex: number | undefined;

	constructor(
		readonly prevLocation: Location,
		readonly prevScroll: Position,
	) {}

	get current(): SearchMatch | undefined {
		return this.currentIndex === undefined ? undefined : this.matches[this.currentIndex];
	}

	/**
	 * 替换匹配集合。
	 * 当前匹配取 from 处或之后的第一个匹配，没有则取第一个，集合为空时为未选中。
	 */
	setMatches(matches: SearchMatch[], from: Location): void {
		this.matches = matches;
		if (matches.length === 0) {
			this.currentIndex = undefined;
			return;
		}
		const index = matches.findIndex((match) => compareLocations(matchLocation(match), from) >= 0);
		this.currentIndex = index === -1 ? 0 : index;
	}

	/** 循环前进到下一个匹配；未选中时选第一个 */
	selectNext(): SearchMatch | undefined {
		if (this.matches.length === 0) {
			return undefined;
		}
		this.currentIndex = this.currentIndex === undefined ? 0 : (this.currentIndex + 1) % this.matches.length;
		return this.current;
	}

	/** 循环后退到上一个匹配；未选中时选最后一个 */
	selectPrevious(): SearchMatch | undefined {
		if (this.matches.length === 0) {
			return undefined;
		}
		const count = this.matches.length;
		this.currentIndex = this.currentIndex === undefined ? count - 1 : (this.currentIndex - 1 + count) % count;
		return this.current;
	}
}
