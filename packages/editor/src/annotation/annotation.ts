/**
 * @file 注解
 *
 * 注解把一段半开偏移区间 [start, end) 标记为某种高亮类型。
 * 多个注解可以重叠，渲染时按优先级取最高者。
 */

/** 高亮类型 */
export type AnnotationType = "match" | "selectedMatch" | "selection";

export interface Annotation {
	type: AnnotationType;
	/** 起始偏移（UTF-16 码元，含） */
	start: number;
	/** 结束偏移（不含） */
	end: number;
}

/** 重叠时的优先级，数值越大越优先 */
export const ANNOTATION_PRECEDENCE: Record<AnnotationType, number> = {
	match: 1,
	selection: 2,
	selectedMatch: 3,
};

/** 找出与 [start, end) 重叠的注解中优先级最高的类型 */
export function dominantAnnotation(
	annotations: readonly Annotation[],
	start: number,
	end: number,
): AnnotationType | undefined {
	let dominant: AnnotationType | undefined;
	for (const annotation of annotations) {
		if (annotation.start >= end || annotation.end <= start) {
			continue;
		}
		if (dominant === undefined || ANNOTATION_PRECEDENCE[annotation.type] > ANNOTATION_PRECEDENCE[dominant]) {
			dominant = annotation.type;
		}
	}
	return dominant;
}
