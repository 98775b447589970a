/**
 * @file 主入口
 *
 * 解析参数、加载设置、初始化日志，然后在真实终端上运行编辑器。
 * 进程因异常或信号退出前总会先恢复终端。
 */

import { ProcessTerminal } from "@glyph-editor/tui";
import chalk from "chalk";
import { parseArgs, printHelp } from "./cli/args.js";
import { APP_NAME, getLogPath, getSettingsPath, getWelcomeMessage, VERSION } from "./config.js";
import { Editor } from "./editor.js";
import { initLogging, logError, logInfo, logWarning } from "./log.js";
import { loadSettings } from "./settings.js";

export async function main(args: string[]): Promise<void> {
	const parsed = parseArgs(args);

	if (parsed.help) {
		printHelp();
		return;
	}
	if (parsed.version) {
		console.log(VERSION);
		return;
	}
	for (const arg of parsed.unknown) {
		console.error(chalk.yellow(`Warning: ignoring argument ${arg}`));
	}

	const { settings, errors } = loadSettings(getSettingsPath());
	const loggingProblem = initLogging({ file: getLogPath(), level: settings.logLevel });
	if (loggingProblem) {
		console.error(chalk.yellow(`Warning (logging): ${loggingProblem}`));
	}
	for (const error of errors) {
		console.error(chalk.yellow(`Warning (settings): ${error}`));
		logWarning(`Invalid settings: ${error}`);
	}
	logInfo(`Starting ${APP_NAME} ${VERSION}`);

	const editor = new Editor(new ProcessTerminal(), {
		settings,
		appName: APP_NAME,
		welcomeMessage: getWelcomeMessage(),
	});

	const fail = (reason: string, error: unknown): void => {
		editor.stop();
		logError(reason, error);
		console.error(chalk.red(`${reason}: ${error instanceof Error ? error.message : String(error)}`));
		process.exit(1);
	};
	process.on("uncaughtException", (error) => fail("Unexpected error", error));
	process.on("unhandledRejection", (error) => fail("Unhandled rejection", error));
	for (const signal of ["SIGTERM", "SIGHUP"] as const) {
		process.on(signal, () => {
			editor.stop();
			logInfo(`Received ${signal}`);
			process.exit(1);
		});
	}

	if (parsed.file !== undefined) {
		await editor.load(parsed.file);
	}
	await editor.run();
	logInfo("Exiting");
	process.exit(0);
}
