/**
 * @file 文件信息
 */

import { basename } from "path";

/** 没有文件路径时显示的名称 */
export const NO_NAME = "[No Name]";

export class FileInfo {
	constructor(readonly path?: string) {}

	hasPath(): boolean {
		return this.path !== undefined;
	}

	/** 用于状态栏和窗口标题的文件名 */
	get displayName(): string {
		return this.path === undefined ? NO_NAME : basename(this.path);
	}

	toString(): string {
		return this.displayName;
	}
}
