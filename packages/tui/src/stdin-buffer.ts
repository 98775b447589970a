/**
 * @file 标准输入缓冲区
 *
 * StdinBuffer 缓冲输入数据并逐个发出完整的序列。
 *
 * stdin 的 data 事件可能以部分块的方式到达（例如 `\x1b` 与 `[A` 分两次到达），
 * 也可能一次携带多个按键（快速输入或粘贴）。没有缓冲的话，
 * 部分转义序列会被误解为 Escape 加普通字符。
 *
 * 括号粘贴模式的内容会作为一个整体通过 "paste" 事件发出。
 */

import { EventEmitter } from "events";

/** ESC 转义字符 */
const ESC = "\x1b";
/** 括号粘贴模式起始标记 */
const BRACKETED_PASTE_START = "\x1b[200~";
/** 括号粘贴模式结束标记 */
const BRACKETED_PASTE_END = "\x1b[201~";

/** 检查以 ESC 开头的数据是否构成完整的转义序列 */
function sequenceLength(data: string): number | "incomplete" {
	if (data.length === 1) {
		return "incomplete";
	}
	const next = data[1];

	// CSI: ESC [ params final-byte(0x40-0x7e)
	if (next === "[") {
		for (let i = 2; i < data.length; i++) {
			const code = data.charCodeAt(i);
			if (code >= 0x40 && code <= 0x7e) {
				return i + 1;
			}
		}
		return "incomplete";
	}

	// SS3: ESC O <char>
	if (next === "O") {
		return data.length >= 3 ? 3 : "incomplete";
	}

	// OSC / DCS / APC: terminated by BEL or ST (ESC \)
	if (next === "]" || next === "P" || next === "_") {
		for (let i = 2; i < data.length; i++) {
			if (data[i] === "\x07") return i + 1;
			if (data[i] === ESC && data[i + 1] === "\\") return i + 2;
		}
		return "incomplete";
	}

	// Meta key: ESC followed by one code point
	const codePoint = data.codePointAt(1);
	return codePoint !== undefined && codePoint > 0xffff ? 3 : 2;
}

/**
 * 将累积的数据拆分为完整序列。
 * 返回拆分出的序列和剩余的不完整数据。
 */
function extractCompleteSequences(buffer: string): { sequences: string[]; remainder: string } {
	const sequences: string[] = [];
	let pos = 0;

	while (pos < buffer.length) {
		const rest = buffer.slice(pos);
		if (rest.startsWith(ESC)) {
			const length = sequenceLength(rest);
			if (length === "incomplete") {
				return { sequences, remainder: rest };
			}
			sequences.push(rest.slice(0, length));
			pos += length;
			continue;
		}

		// Plain text: one code point per sequence
		const codePoint = rest.codePointAt(0);
		const length = codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
		sequences.push(rest.slice(0, length));
		pos += length;
	}

	return { sequences, remainder: "" };
}

/** StdinBuffer 配置选项 */
export interface StdinBufferOptions {
	/** 不完整序列的最大等待时间（毫秒），超时后原样发出，默认 10ms */
	timeout?: number;
}

/** StdinBuffer 发出的事件映射 */
export interface StdinBufferEventMap {
	data: [string];
	paste: [string];
}

/**
 * 标准输入缓冲区。
 * 通过 process() 送入原始数据，通过 "data" 事件接收完整的序列，
 * 通过 "paste" 事件接收括号粘贴的内容。
 */
export class StdinBuffer extends EventEmitter<StdinBufferEventMap> {
	/** 尚未构成完整序列的数据 */
	private buffer = "";
	/** 不完整序列的超时定时器 */
	private timeout: ReturnType<typeof setTimeout> | null = null;
	private readonly timeoutMs: number;
	/** 是否处于括号粘贴模式中 */
	private pasteMode = false;
	/** 粘贴模式下累积的内容 */
	private pasteBuffer = "";

	constructor(options: StdinBufferOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 10;
	}

	/** 送入一块原始输入数据 */
	process(data: string | Buffer): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}

		let str = typeof data === "string" ? data : data.toString("utf8");
		if (str.length === 0 && this.buffer.length === 0) {
			// An empty chunk stands for a bare escape on some terminals
			this.emit("data", "");
			return;
		}

		if (this.pasteMode) {
			this.consumePaste(str);
			return;
		}

		str = this.buffer + str;
		this.buffer = "";

		const pasteStart = str.indexOf(BRACKETED_PASTE_START);
		if (pasteStart !== -1) {
			this.emitSequences(str.slice(0, pasteStart));
			this.pasteMode = true;
			this.consumePaste(str.slice(pasteStart + BRACKETED_PASTE_START.length));
			return;
		}

		this.emitSequences(str);
	}

	/** 立即发出所有缓冲的数据（即使不完整） */
	flush(): string[] {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
		if (this.buffer.length === 0) {
			return [];
		}
		const flushed = [this.buffer];
		this.buffer = "";
		return flushed;
	}

	/** 清空缓冲区并取消定时器 */
	clear(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
		this.buffer = "";
		this.pasteMode = false;
		this.pasteBuffer = "";
	}

	/** 获取当前缓冲的不完整数据 */
	getBuffer(): string {
		return this.buffer;
	}

	destroy(): void {
		this.clear();
		this.removeAllListeners();
	}

	private consumePaste(str: string): void {
		this.pasteBuffer += str;
		const endIndex = this.pasteBuffer.indexOf(BRACKETED_PASTE_END);
		if (endIndex === -1) {
			return;
		}
		const content = this.pasteBuffer.slice(0, endIndex);
		const remaining = this.pasteBuffer.slice(endIndex + BRACKETED_PASTE_END.length);
		this.pasteMode = false;
		this.pasteBuffer = "";
		this.emit("paste", content);
		if (remaining.length > 0) {
			this.process(remaining);
		}
	}

	private emitSequences(str: string): void {
		const { sequences, remainder } = extractCompleteSequences(str);
		for (const sequence of sequences) {
			this.emit("data", sequence);
		}
		this.buffer = remainder;
		if (remainder.length > 0) {
			// A lone ESC is the Escape key unless more bytes follow quickly
			this.timeout = setTimeout(() => {
				for (const sequence of this.flush()) {
					this.emit("data", sequence);
				}
			}, this.timeoutMs);
		}
	}
}
