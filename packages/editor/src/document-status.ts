/**
 * @file 文档状态
 *
 * View 向状态栏报告的快照。
 */

export interface DocumentStatus {
	totalLines: number;
	/** 光标所在行（从 0 开始） */
	currentLineIndex: number;
	isModified: boolean;
	fileName: string;
}

export function modifiedIndicator(status: DocumentStatus): string {
	return status.isModified ? "(modified)" : "";
}

export function lineCountText(status: DocumentStatus): string {
	return `${status.totalLines} lines`;
}

/** 形如 "3/10" 的位置指示 */
export function positionIndicator(status: DocumentStatus): string {
	return `${status.currentLineIndex + 1}/${status.totalLines}`;
}
