/**
 * @file 编辑器控制器
 *
 * Editor 把 View、StatusBar、MessageBar、CommandBar 接入 TUI，
 * 将输入翻译为命令并按当前提示模式分派：
 * - none：编辑文档，Ctrl-F 查找，Ctrl-S 保存，Ctrl-Q 退出
 * - search：输入查询串，方向键切换匹配，Enter 确认，Esc 取消
 * - save：输入文件名，Enter 保存，Esc 放弃
 */

import { EditorKeybindingsManager, type KeyId, type Region, type Terminal, TUI } from "@glyph-editor/tui";
import { type Command, commandFromInput, type EditCommand, type MoveCommand } from "./commands.js";
import { CommandBar } from "./components/command-bar.js";
import { MessageBar } from "./components/message-bar.js";
import { StatusBar } from "./components/status-bar.js";
import { logError, logInfo } from "./log.js";
import { DEFAULT_SETTINGS, type Settings } from "./settings.js";
import { defaultTheme, type EditorTheme } from "./theme.js";
import { Buffer, FileAccessError } from "./view/buffer.js";
import { View } from "./view/view.js";

export type PromptType = "none" | "search" | "save";

export const SEARCH_PROMPT = "Search (Esc to cancel, Arrows to navigate): ";
export const SAVE_PROMPT = "Save as: ";

export interface EditorOptions {
	settings?: Settings;
	theme?: EditorTheme;
	/** 应用名，用于窗口标题 */
	appName?: string;
	welcomeMessage?: string;
	/** 当前时间（毫秒），测试时可替换 */
	now?: () => number;
}

/** 把 "ctrl+f" 形式的按键标识符格式化为 "Ctrl-F" */
export function formatKeyId(keyId: KeyId): string {
	return keyId
		.split("+")
		.map((part) => (part.length === 1 ? part.toUpperCase() : part.charAt(0).toUpperCase() + part.slice(1)))
		.join("-");
}

export class Editor {
	readonly tui: TUI;
	readonly view: View;
	readonly statusBar: StatusBar;
	readonly messageBar: MessageBar;
	readonly commandBar: CommandBar;

	private readonly keybindings: EditorKeybindingsManager;
	private readonly settings: Settings;
	private readonly appName: string;
	private promptType: PromptType = "none";
	/** 有未保存修改时已连按退出的次数 */
	private quitPresses = 0;
	private title = "";
	private messageTimer: ReturnType<typeof setTimeout> | undefined;
	private removeInputListener: (() => void) | undefined;
	private resolveDone: (() => void) | undefined;
	private readonly done: Promise<void>;

	constructor(terminal: Terminal, options: EditorOptions = {}) {
		const theme = options.theme ?? defaultTheme;
		this.settings = options.settings ?? DEFAULT_SETTINGS;
		this.appName = options.appName ?? "glyph";
		this.keybindings = new EditorKeybindingsManager(this.settings.keybindings);

		this.tui = new TUI(terminal);
		this.view = new View(new Buffer(), { theme, welcomeMessage: options.welcomeMessage });
		this.statusBar = new StatusBar(theme);
		this.messageBar = new MessageBar({ theme, timeoutMs: this.settings.messageTimeoutMs, now: options.now });
		this.commandBar = new CommandBar(theme);

		this.done = new Promise<void>((resolve) => {
			this.resolveDone = resolve;
		});

		this.applyLayout();
	}

	getPromptType(): PromptType {
		return this.promptType;
	}

	getTitle(): string {
		return this.title;
	}

	/** 打开文件；失败时在消息栏报告并保留空文档 */
	async load(path: string): Promise<void> {
		try {
			const buffer = await Buffer.load(path);
			this.view.setBuffer(buffer);
			logInfo(`Loaded ${path} (${buffer.lineCount()} lines)`);
		} catch (error) {
			if (!(error instanceof FileAccessError)) {
				throw error;
			}
			logError(`Could not open file: ${path}`, error);
			this.view.setBuffer(Buffer.fromLines([], path));
			this.setMessage(`ERR: Could not open file: ${path}`);
		}
		this.refreshStatus();
	}

	/** 启动界面，返回在退出时完成的 Promise */
	run(): Promise<void> {
		this.removeInputListener = this.tui.addInputListener((data) => {
			this.handleInput(data);
			return { consume: true };
		});
		this.tui.start();
		// A load error set before start stays visible
		if (this.messageBar.getMessage() === "") {
			this.setMessage(this.helpMessage());
		}
		this.refreshStatus();
		return this.done;
	}

	/** 停止界面并恢复终端；可重复调用 */
	stop(): void {
		if (this.messageTimer) {
			clearTimeout(this.messageTimer);
			this.messageTimer = undefined;
		}
		this.removeInputListener?.();
		this.removeInputListener = undefined;
		this.tui.stop();
	}

	private quit(): void {
		this.stop();
		this.resolveDone?.();
	}

	// =========================================================================
	// 输入分派
	// =========================================================================

	/** 处理一个输入序列 */
	handleInput(data: string): void {
		const command = commandFromInput(data, this.keybindings);
		if (!command) {
			return;
		}
		switch (this.promptType) {
			case "none":
				this.processCommandNoPrompt(command);
				break;
			case "search":
				this.processCommandDuringSearch(command);
				break;
			case "save":
				this.processCommandDuringSave(command);
				break;
		}
		this.refreshStatus();
		this.tui.requestRender();
	}

	private processCommandNoPrompt(command: Command): void {
		if (command.kind === "system" && command.action === "quit") {
			this.handleQuit();
			return;
		}
		this.resetQuitPresses();

		switch (command.kind) {
			case "system":
				if (command.action === "save") {
					this.handleSave();
				} else if (command.action === "search") {
					this.enterSearch();
				}
				break;
			case "move":
			case "edit":
				this.view.handleCommand(command);
				break;
		}
	}

	private processCommandDuringSearch(command: Command): void {
		switch (command.kind) {
			case "system":
				if (command.action === "dismiss") {
					this.view.cancelSearch();
					this.leavePrompt();
				}
				break;
			case "edit":
				if (command.action === "newline") {
					this.view.commitSearch();
					this.leavePrompt();
				} else {
					this.editPrompt(command);
					this.view.setSearchQuery(this.commandBar.getValue());
				}
				break;
			case "move":
				this.navigateSearch(command);
				break;
		}
	}

	private navigateSearch(command: MoveCommand): void {
		if (command.direction === "right" || command.direction === "down") {
			this.view.searchNext();
		} else if (command.direction === "left" || command.direction === "up") {
			this.view.searchPrevious();
		}
	}

	private processCommandDuringSave(command: Command): void {
		switch (command.kind) {
			case "system":
				if (command.action === "dismiss") {
					this.leavePrompt();
					this.setMessage("Save aborted.");
				} else if (command.action === "quit") {
					this.handleQuit();
				}
				break;
			case "edit":
				if (command.action === "newline") {
					const path = this.commandBar.getValue();
					this.leavePrompt();
					if (path.length === 0) {
						this.setMessage("Save aborted.");
					} else {
						this.runSave(path);
					}
				} else {
					this.editPrompt(command);
				}
				break;
			case "move":
				break;
		}
	}

	private editPrompt(command: EditCommand): void {
		this.commandBar.handleEditCommand(command);
	}

	// =========================================================================
	// 系统命令
	// =========================================================================

	private handleQuit(): void {
		const quitTimes = this.settings.quitTimes;
		if (!this.view.getStatus().isModified || this.quitPresses + 1 >= quitTimes) {
			this.quit();
			return;
		}
		const remaining = quitTimes - this.quitPresses - 1;
		this.setMessage(`WARNING! File has unsaved changes. Press Ctrl-Q ${remaining} more times to quit.`);
		this.quitPresses += 1;
	}

	private resetQuitPresses(): void {
		if (this.quitPresses > 0) {
			this.quitPresses = 0;
			this.setMessage("");
		}
	}

	private handleSave(): void {
		if (this.view.getBuffer().fileInfo.hasPath()) {
			this.runSave(undefined);
		} else {
			this.enterPrompt("save");
		}
	}

	/** 保存（path 为 undefined 时保存到当前文件），完成后报告结果 */
	private runSave(path: string | undefined): void {
		void this.save(path).then(() => this.tui.requestRender());
	}

	/** 保存并在消息栏报告结果；写入失败不会抛出 */
	async save(path?: string): Promise<void> {
		const buffer = this.view.getBuffer();
		try {
			if (path === undefined) {
				await buffer.save();
			} else {
				await buffer.saveAs(path);
			}
			logInfo(`Saved ${buffer.fileInfo.path ?? ""}`);
			this.setMessage("File saved successfully.");
		} catch (error) {
			logError("Error writing file", error);
			this.setMessage("Error writing file!");
		}
		this.refreshStatus();
	}

	private enterSearch(): void {
		this.view.enterSearch();
		this.enterPrompt("search");
	}

	// =========================================================================
	// 提示模式与布局
	// =========================================================================

	private enterPrompt(type: Exclude<PromptType, "none">): void {
		this.promptType = type;
		this.commandBar.clearValue();
		this.commandBar.setPrompt(type === "search" ? SEARCH_PROMPT : SAVE_PROMPT);
		this.applyLayout();
	}

	private leavePrompt(): void {
		this.promptType = "none";
		this.commandBar.clearValue();
		this.applyLayout();
	}

	/** 视图占据剩余行，状态栏一行，底部一行为消息栏或命令栏 */
	private applyLayout(): void {
		const bottom = this.promptType === "none" ? this.messageBar : this.commandBar;
		const regions: Region[] = [
			{ component: this.view, height: "fill" },
			{ component: this.statusBar, height: 1 },
			{ component: bottom, height: 1 },
		];
		this.tui.setRegions(regions);
		this.tui.setFocus(this.promptType === "none" ? this.view : this.commandBar);
	}

	private setMessage(message: string): void {
		this.messageBar.setMessage(message);
		if (this.messageTimer) {
			clearTimeout(this.messageTimer);
		}
		if (message.length === 0 || !this.tui.isRunning()) {
			this.messageTimer = undefined;
			return;
		}
		// Redraw once the message has expired
		this.messageTimer = setTimeout(() => {
			this.messageTimer = undefined;
			this.tui.requestRender();
		}, this.messageBar.timeoutMs + 1);
		this.messageTimer.unref();
	}

	private helpMessage(): string {
		const key = (action: "search" | "save" | "quit"): string => formatKeyId(this.keybindings.getKeys(action)[0] ?? "");
		return `HELP: ${key("search")} = find | ${key("save")} = save | ${key("quit")} = quit`;
	}

	private refreshStatus(): void {
		const status = this.view.getStatus();
		this.statusBar.updateStatus(status);
		const title = `${status.fileName} - ${this.appName}`;
		if (title !== this.title) {
			this.title = title;
			this.tui.terminal.setTitle(title);
		}
	}
}
