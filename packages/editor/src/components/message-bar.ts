/**
 * @file 消息栏
 *
 * 显示一条消息，超过 messageTimeoutMs 后自动消失。
 */

import { type Component, truncateToWidth } from "@glyph-editor/tui";
import { defaultTheme, type EditorTheme } from "../theme.js";
import type { Size } from "../types.js";

export const DEFAULT_MESSAGE_TIMEOUT_MS = 5000;

export interface MessageBarOptions {
	theme?: EditorTheme;
	timeoutMs?: number;
	/** 当前时间（毫秒），测试时可替换 */
	now?: () => number;
}

export class MessageBar implements Component {
	private message = "";
	private setAt = 0;
	private width = 0;
	private readonly theme: EditorTheme;
	private readonly now: () => number;

	readonly timeoutMs: number;

	constructor(options: MessageBarOptions = {}) {
		this.theme = options.theme ?? defaultTheme;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_MESSAGE_TIMEOUT_MS;
		this.now = options.now ?? Date.now;
	}

	setMessage(message: string): void {
		this.message = message;
		this.setAt = this.now();
	}

	/** 当前仍然可见的消息，已过期时为空串 */
	getMessage(): string {
		return this.isExpired() ? "" : this.message;
	}

	isExpired(): boolean {
		return this.now() - this.setAt > this.timeoutMs;
	}

	resize(size: Size): void {
		this.width = size.width;
	}

	invalidate(): void {
		// Expiry is time based; nothing to cache
	}

	render(): string[] {
		const message = this.getMessage();
		if (message.length === 0) {
			return [""];
		}
		return [this.theme.message(truncateToWidth(message, this.width, ""))];
	}
}
