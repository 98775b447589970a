/**
 * @file 终端接口和实现
 *
 * 本文件定义了 TUI 框架所需的终端抽象接口（Terminal），
 * 以及基于 process.stdin/stdout 的真实终端实现（ProcessTerminal）。
 *
 * ProcessTerminal 负责：
 * - 启用原始模式（raw mode）以获取逐键输入
 * - 切换到备用屏幕缓冲区并关闭自动换行
 * - 启用括号粘贴模式（bracketed paste mode）
 * - 通过 StdinBuffer 将批量输入拆分为独立序列
 */

import { StdinBuffer } from "./stdin-buffer.js";

/**
 * TUI 框架的最小终端接口
 *
 * 定义了 TUI 需要的所有终端操作，
 * 可以用不同的实现替换（如测试用的模拟终端）。
 */
export interface Terminal {
	/** 使用输入和调整大小的处理器启动终端 */
	start(onInput: (data: string) => void, onResize: () => void): void;

	/** 停止终端并恢复状态 */
	stop(): void;

	/** 向终端写入输出 */
	write(data: string): void;

	/** 获取终端列数 */
	get columns(): number;
	/** 获取终端行数 */
	get rows(): number;

	/** 隐藏光标 */
	hideCursor(): void;
	/** 显示光标 */
	showCursor(): void;

	/** 清除整个屏幕并将光标移到 (0,0) */
	clearScreen(): void;

	/** 设置终端窗口标题 */
	setTitle(title: string): void;
}

/**
 * 基于 process.stdin/stdout 的真实终端实现
 *
 * 启动时会：
 * 1. 启用原始模式以获取逐键输入
 * 2. 进入备用屏幕并关闭自动换行
 * 3. 启用括号粘贴模式
 *
 * stop() 按相反顺序撤销以上所有操作，可重复调用。
 */
export class ProcessTerminal implements Terminal {
	/** 启动前是否已处于原始模式 */
	private wasRaw = false;
	/** 终端是否已启动 */
	private started = false;
	/** 键盘输入处理回调 */
	private inputHandler?: (data: string) => void;
	/** 终端大小调整处理回调 */
	private resizeHandler?: () => void;
	/** 标准输入缓冲区（将批量输入拆分为独立序列） */
	private stdinBuffer?: StdinBuffer;
	/** stdin data 事件处理器引用（用于后续清理） */
	private stdinDataHandler?: (data: string) => void;

	start(onInput: (data: string) => void, onResize: () => void): void {
		if (this.started) {
			return;
		}
		this.started = true;
		this.inputHandler = onInput;
		this.resizeHandler = onResize;

		// Save previous state and enable raw mode
		this.wasRaw = process.stdin.isRaw || false;
		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(true);
		}
		process.stdin.setEncoding("utf8");
		process.stdin.resume();

		// Alternate screen, no auto-wrap
		process.stdout.write("\x1b[?1049h\x1b[?7l");

		// Enable bracketed paste mode - terminal will wrap pastes in \x1b[200~ ... \x1b[201~
		process.stdout.write("\x1b[?2004h");

		process.stdout.on("resize", this.resizeHandler);

		this.setupStdinBuffer();
	}

	/**
	 * 设置 StdinBuffer 将批量输入拆分为独立序列。
	 * 确保组件接收单个事件，使 matchesKey 正确工作。
	 */
	private setupStdinBuffer(): void {
		const stdinBuffer = new StdinBuffer({ timeout: 10 });
		this.stdinBuffer = stdinBuffer;

		stdinBuffer.on("data", (sequence) => {
			this.inputHandler?.(sequence);
		});

		// Re-wrap paste content with bracketed paste markers for the key decoder
		stdinBuffer.on("paste", (content) => {
			this.inputHandler?.(`\x1b[200~${content}\x1b[201~`);
		});

		this.stdinDataHandler = (data: string) => {
			stdinBuffer.process(data);
		};
		process.stdin.on("data", this.stdinDataHandler);
	}

	stop(): void {
		if (!this.started) {
			return;
		}
		this.started = false;

		// Disable bracketed paste mode
		process.stdout.write("\x1b[?2004l");

		// Restore auto-wrap, cursor and the main screen
		process.stdout.write("\x1b[?7h\x1b[?25h\x1b[?1049l");

		if (this.stdinBuffer) {
			this.stdinBuffer.destroy();
			this.stdinBuffer = undefined;
		}

		if (this.stdinDataHandler) {
			process.stdin.removeListener("data", this.stdinDataHandler);
			this.stdinDataHandler = undefined;
		}
		this.inputHandler = undefined;
		if (this.resizeHandler) {
			process.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}

		// Pause stdin so buffered input is not re-interpreted after raw mode is disabled
		process.stdin.pause();

		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(this.wasRaw);
		}
	}

	write(data: string): void {
		process.stdout.write(data);
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	hideCursor(): void {
		process.stdout.write("\x1b[?25l");
	}

	showCursor(): void {
		process.stdout.write("\x1b[?25h");
	}

	clearScreen(): void {
		process.stdout.write("\x1b[2J\x1b[H"); // Clear screen and move to home (1,1)
	}

	setTitle(title: string): void {
		// OSC 0;title BEL - set terminal window title
		process.stdout.write(`\x1b]0;${title}\x07`);
	}
}
