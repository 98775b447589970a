/**
 * @file log.ts - 文件日志模块
 *
 * 终端屏幕归编辑器所有，日志逐行追加到日志文件中，格式为：
 * [YYYY-MM-DD HH:MM:SS] LEVEL message
 *
 * 写入失败时在本次运行中停用文件日志。
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warning" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warning: 2,
	error: 3,
};

const LEVEL_TAGS: Record<LogLevel, string> = {
	debug: chalk.gray("DEBUG"),
	info: chalk.blue("INFO"),
	warning: chalk.yellow("WARN"),
	error: chalk.red("ERROR"),
};

let logFile: string | undefined;
let minLevel: LogLevel = "info";

export interface LoggingOptions {
	/** 日志文件路径，不提供时不记录 */
	file?: string;
	level?: LogLevel;
}

/**
 * 配置日志输出。
 * 日志目录无法创建时停用文件日志，并返回供调用方报告的说明。
 */
export function initLogging(options: LoggingOptions): string | undefined {
	minLevel = options.level ?? "info";
	logFile = options.file;
	if (!logFile) {
		return undefined;
	}
	const dir = dirname(logFile);
	try {
		mkdirSync(dir, { recursive: true });
	} catch (error) {
		logFile = undefined;
		return `Could not create log directory ${dir}: ${error instanceof Error ? error.message : String(error)}`;
	}
	return undefined;
}

/** 当前日志文件（未启用时为 undefined） */
export function getLogFile(): string | undefined {
	return logFile;
}

/**
 * 生成当前时间戳字符串
 * @returns 格式为 [YYYY-MM-DD HH:MM:SS] 的时间戳
 */
function timestamp(): string {
	const now = new Date();
	const date = `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, "0")}-${String(now.getDate()).padStart(2, "0")}`;
	const hh = String(now.getHours()).padStart(2, "0");
	const mm = String(now.getMinutes()).padStart(2, "0");
	const ss = String(now.getSeconds()).padStart(2, "0");
	return `[${date} ${hh}:${mm}:${ss}]`;
}

function write(level: LogLevel, message: string): void {
	if (!logFile || LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
		return;
	}
	try {
		appendFileSync(logFile, `${timestamp()} ${LEVEL_TAGS[level]} ${message}\n`, "utf8");
	} catch {
		// Log file became unwritable; stop trying for this session
		logFile = undefined;
	}
}

/** 把错误（含原因链）格式化为多行文本 */
export function formatError(error: unknown): string {
	if (!(error instanceof Error)) {
		return String(error);
	}
	let text = error.stack ?? `${error.name}: ${error.message}`;
	if (error.cause !== undefined) {
		text += `\nCaused by: ${formatError(error.cause)}`;
	}
	return text;
}

export function logDebug(message: string): void {
	write("debug", message);
}

export function logInfo(message: string): void {
	write("info", message);
}

export function logWarning(message: string): void {
	write("warning", message);
}

export function logError(message: string, error?: unknown): void {
	write("error", error === undefined ? message : `${message}\n${formatError(error)}`);
}
