/**
 * @file 选区
 */

import type { Annotation } from "../annotation/annotation.js";
import type { Line } from "../line/line.js";
import { compareLocations, type Location } from "../types.js";

/** 从锚点到活动端的选区；start/end 为按文档顺序排好的两端 */
export class Selection {
	constructor(
		readonly anchor: Location,
		public head: Location,
	) {}

	get start(): Location {
		return compareLocations(this.anchor, this.head) <= 0 ? this.anchor : this.head;
	}

	get end(): Location {
		return compareLocations(this.anchor, this.head) <= 0 ? this.head : this.anchor;
	}

	isEmpty(): boolean {
		return compareLocations(this.anchor, this.head) === 0;
	}

	/** 选区落在某一行上的部分 */
	annotationsForLine(lineIndex: number, line: Line): Annotation[] {
		const { start, end } = this;
		if (lineIndex < start.lineIndex || lineIndex > end.lineIndex) {
			return [];
		}
		const from = lineIndex === start.lineIndex ? line.offsetOfGrapheme(start.graphemeIndex) : 0;
		const to = lineIndex === end.lineIndex ? line.offsetOfGrapheme(end.graphemeIndex) : line.length;
		return to > from ? [{ type: "selection", start: from, end: to }] : [];
	}
}
