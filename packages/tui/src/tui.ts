/**
 * @file TUI 核心实现 - 全屏差异化终端渲染引擎
 *
 * 本文件实现了终端 UI 框架的核心功能，包括：
 * - Component 组件接口定义
 * - 按区域（Region）纵向布局组件
 * - TUI 主类（差异化渲染、焦点管理、硬件光标定位）
 *
 * 渲染机制：
 * TUI 接管整个备用屏幕，每次渲染得到恰好 rows 行、每行恰好 columns 列的内容，
 * 只重写与上一帧不同的行，并使用同步输出（Synchronized Output）避免撕裂。
 */

import type { Terminal } from "./terminal.js";
import { truncateToWidth, visibleWidth } from "./utils.js";

/** 组件或终端的尺寸（列数 × 行数） */
export interface Size {
	width: number;
	height: number;
}

/** 屏幕坐标（0 起始） */
export interface Position {
	row: number;
	col: number;
}

/**
 * 组件接口 - 所有 TUI 组件必须实现此接口
 */
export interface Component {
	/**
	 * 将组件渲染为行数组。
	 * 行数与每行宽度应符合最近一次 resize() 给出的尺寸，
	 * 多出的部分会被 TUI 截断，不足的部分会被填充。
	 */
	render(): string[];

	/** 布局变化时由 TUI 调用 */
	resize(size: Size): void;

	/**
	 * 使缓存的渲染状态失效。
	 * 在组件需要从头重新渲染时调用。
	 */
	invalidate(): void;

	/**
	 * 可选的键盘输入处理器，当组件获得焦点时被调用
	 */
	handleInput?(data: string): void;
}

/** 输入监听器的返回结果类型：consume 为 true 时消费输入，data 可用于修改输入数据 */
export type InputListenerResult = { consume?: boolean; data?: string } | undefined;
/** 输入监听器函数类型，用于拦截和处理原始键盘输入 */
export type InputListener = (data: string) => InputListenerResult;

/**
 * 可聚焦组件接口 - 用于接收焦点和显示硬件光标。
 * 当组件获得焦点时，应在渲染输出中的光标位置发出 CURSOR_MARKER。
 * TUI 会找到此标记并将硬件光标定位到该位置。
 */
export interface Focusable {
	/** 由 TUI 在焦点变化时设置。当为 true 时，组件应在渲染中发出 CURSOR_MARKER。 */
	focused: boolean;
}

/**
 * 类型守卫：检查组件是否实现了 Focusable 接口
 */
export function isFocusable(component: Component | null): component is Component & Focusable {
	return component !== null && "focused" in component;
}

/**
 * 光标位置标记 - APC（应用程序命令）转义序列。
 * 这是一个零宽度的转义序列，终端会忽略它。
 */
export const CURSOR_MARKER = "\x1b_glyph:c\x07";

/** 布局区域：固定行数，或 "fill" 占据剩余的全部行 */
export interface Region {
	component: Component;
	height: number | "fill";
}

/** 按区域顺序计算每个组件分得的行数 */
export function layoutRegions(regions: Region[], size: Size): number[] {
	const fixed = regions.reduce((sum, r) => (r.height === "fill" ? sum : sum + Math.max(0, r.height)), 0);
	const fillCount = regions.filter((r) => r.height === "fill").length;
	const remaining = Math.max(0, size.height - fixed);
	const perFill = fillCount > 0 ? Math.floor(remaining / fillCount) : 0;

	let available = size.height;
	return regions.map((region, index) => {
		let height = region.height === "fill" ? perFill : Math.max(0, region.height);
		// The last fill region takes the rounding remainder
		if (region.height === "fill" && regions.slice(index + 1).every((r) => r.height !== "fill")) {
			height = remaining - perFill * (fillCount - 1);
		}
		height = Math.min(height, available);
		available -= height;
		return height;
	});
}

/**
 * TUI 主类 - 管理全屏终端 UI 的差异化渲染引擎
 *
 * 核心职责：
 * - 布局：将终端行分配给各区域的组件
 * - 差异化渲染：只更新变化的行，减少终端闪烁
 * - 焦点管理：跟踪焦点组件并将输入路由给它
 * - 硬件光标定位：根据 CURSOR_MARKER 放置光标
 */
export class TUI {
	/** 每行末尾追加的样式重置 */
	static readonly SEGMENT_RESET = "\x1b[0m";

	/** 终端接口实例 */
	public terminal: Terminal;
	/** 布局区域 */
	private regions: Region[] = [];
	/** 上一次渲染的行内容（用于差异比较） */
	private previousLines: string[] = [];
	/** 上一次渲染时的终端尺寸 */
	private previousSize: Size = { width: 0, height: 0 };
	/** 当前获得焦点的组件 */
	private focusedComponent: Component | null = null;
	/** 输入监听器集合（拦截/修改原始输入） */
	private inputListeners = new Set<InputListener>();
	/** 是否已请求渲染（防止同一 tick 内重复渲染） */
	private renderRequested = false;
	/** 完整重绘计数 */
	private fullRedrawCount = 0;
	/** 是否正在运行 */
	private running = false;

	constructor(terminal: Terminal) {
		this.terminal = terminal;
	}

	/** 获取完整重绘次数 */
	get fullRedraws(): number {
		return this.fullRedrawCount;
	}

	/** 设置布局区域并重新布局 */
	setRegions(regions: Region[]): void {
		this.regions = [...regions];
		this.layout();
		this.requestRender();
	}

	getRegions(): readonly Region[] {
		return this.regions;
	}

	/** 设置焦点组件，同时更新旧组件和新组件的 focused 标志 */
	setFocus(component: Component | null): void {
		if (isFocusable(this.focusedComponent)) {
			this.focusedComponent.focused = false;
		}

		this.focusedComponent = component;

		if (isFocusable(component)) {
			component.focused = true;
		}
		this.requestRender();
	}

	getFocus(): Component | null {
		return this.focusedComponent;
	}

	/** 启动 TUI - 开始监听输入和调整大小事件，隐藏光标并触发首次渲染 */
	start(): void {
		if (this.running) return;
		this.running = true;
		this.terminal.start(
			(data) => this.handleInput(data),
			() => this.handleResize(),
		);
		this.terminal.hideCursor();
		this.terminal.clearScreen();
		this.layout();
		this.requestRender(true);
	}

	/** 停止 TUI - 恢复样式与光标，停止终端。可重复调用 */
	stop(): void {
		if (!this.running) return;
		this.running = false;
		this.terminal.write(TUI.SEGMENT_RESET);
		this.terminal.showCursor();
		this.terminal.stop();
	}

	isRunning(): boolean {
		return this.running;
	}

	/** 添加输入监听器，返回取消注册的函数 */
	addInputListener(listener: InputListener): () => void {
		this.inputListeners.add(listener);
		return () => {
			this.inputListeners.delete(listener);
		};
	}

	/** 移除输入监听器 */
	removeInputListener(listener: InputListener): void {
		this.inputListeners.delete(listener);
	}

	/** 使所有组件的缓存失效 */
	invalidate(): void {
		for (const region of this.regions) {
			region.component.invalidate();
		}
	}

	/** 请求渲染。force=true 时强制完整重绘（清除所有缓存状态） */
	requestRender(force = false): void {
		if (force) {
			this.previousLines = [];
			this.previousSize = { width: 0, height: 0 };
		}
		if (this.renderRequested || !this.running) return;
		this.renderRequested = true;
		process.nextTick(() => {
			this.renderRequested = false;
			this.doRender();
		});
	}

	/** 处理键盘输入：先经过监听器链，然后路由到聚焦的组件 */
	private handleInput(data: string): void {
		let current = data;
		for (const listener of this.inputListeners) {
			const result = listener(current);
			if (result?.consume) {
				this.requestRender();
				return;
			}
			if (result?.data !== undefined) {
				current = result.data;
			}
		}

		if (this.focusedComponent?.handleInput) {
			this.focusedComponent.handleInput(current);
			this.requestRender();
		}
	}

	private handleResize(): void {
		this.layout();
		this.invalidate();
		this.requestRender(true);
	}

	/** 根据终端尺寸向各组件分配区域 */
	private layout(): void {
		const size = { width: this.terminal.columns, height: this.terminal.rows };
		const heights = layoutRegions(this.regions, size);
		this.regions.forEach((region, index) => {
			region.component.resize({ width: size.width, height: heights[index] ?? 0 });
		});
	}

	/** 渲染所有区域，得到恰好 height 行、每行恰好 width 列的内容 */
	private composeFrame(size: Size): string[] {
		const heights = layoutRegions(this.regions, size);
		const lines: string[] = [];
		this.regions.forEach((region, index) => {
			const height = heights[index] ?? 0;
			const rendered = height > 0 ? region.component.render() : [];
			for (let i = 0; i < height; i++) {
				lines.push(rendered[i] ?? "");
			}
		});
		while (lines.length < size.height) {
			lines.push("");
		}
		return lines.slice(0, size.height);
	}

	/** 找到并移除光标标记，返回其屏幕位置 */
	private extractCursorPosition(lines: string[]): Position | null {
		for (let row = 0; row < lines.length; row++) {
			const line = lines[row] ?? "";
			const markerIndex = line.indexOf(CURSOR_MARKER);
			if (markerIndex !== -1) {
				// Calculate visual column (width of text before marker)
				const beforeMarker = line.slice(0, markerIndex);
				const col = visibleWidth(beforeMarker);

				lines[row] = beforeMarker + line.slice(markerIndex + CURSOR_MARKER.length);
				return { row, col };
			}
		}
		return null;
	}

	/** 将每行截断或填充到恰好 width 列，并在末尾重置样式 */
	private fitLines(lines: string[], width: number): string[] {
		return lines.map((line) => truncateToWidth(line, width, "", true) + TUI.SEGMENT_RESET);
	}

	/** 执行实际的差异化渲染 - 比较新旧行，只更新变化的部分 */
	private doRender(): void {
		if (!this.running) return;
		const size = { width: this.terminal.columns, height: this.terminal.rows };

		let newLines = this.composeFrame(size);
		const cursorPos = this.extractCursorPosition(newLines);
		newLines = this.fitLines(newLines, size.width);

		const sizeChanged = this.previousSize.width !== size.width || this.previousSize.height !== size.height;

		let buffer = "\x1b[?2026h"; // Begin synchronized output
		if (sizeChanged) {
			this.fullRedrawCount += 1;
			buffer += "\x1b[2J";
		}
		for (let row = 0; row < newLines.length; row++) {
			const line = newLines[row] ?? "";
			if (!sizeChanged && this.previousLines[row] === line) {
				continue;
			}
			buffer += `\x1b[${row + 1};1H\x1b[2K${line}`;
		}

		if (cursorPos) {
			const col = Math.min(cursorPos.col, Math.max(0, size.width - 1));
			buffer += `\x1b[${cursorPos.row + 1};${col + 1}H\x1b[?25h`;
		} else {
			buffer += "\x1b[?25l";
		}
		buffer += "\x1b[?2026l"; // End synchronized output
		this.terminal.write(buffer);

		this.previousLines = newLines;
		this.previousSize = size;
	}
}
