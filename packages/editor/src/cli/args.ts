/**
 * @file 命令行参数解析
 */

import chalk from "chalk";
import { APP_NAME, ENV_CONFIG_DIR, ENV_LOG, VERSION } from "../config.js";

export interface Args {
	help: boolean;
	version: boolean;
	/** 要打开的文件 */
	file?: string;
	/** 无法识别的参数 */
	unknown: string[];
}

export function parseArgs(args: readonly string[]): Args {
	const result: Args = { help: false, version: false, unknown: [] };
	let onlyFiles = false;

	for (const arg of args) {
		if (!onlyFiles && arg === "--") {
			onlyFiles = true;
		} else if (!onlyFiles && (arg === "--help" || arg === "-h")) {
			result.help = true;
		} else if (!onlyFiles && (arg === "--version" || arg === "-v")) {
			result.version = true;
		} else if (!onlyFiles && arg.startsWith("-") && arg !== "-") {
			result.unknown.push(arg);
		} else if (result.file === undefined) {
			result.file = arg;
		} else {
			result.unknown.push(arg);
		}
	}
	return result;
}

export function helpText(): string {
	return `${chalk.bold(APP_NAME)} - Unicode-aware terminal text editor

${chalk.bold("Usage:")}
  ${APP_NAME} [options] [file]

${chalk.bold("Options:")}
  -h, --help       Show this help
  -v, --version    Print the version

${chalk.bold("Keys:")}
  Ctrl-F           Find (arrows move between matches, Enter keeps, Esc cancels)
  Ctrl-S           Save
  Ctrl-Q           Quit
  Shift+Arrows     Select

${chalk.bold("Environment:")}
  ${ENV_CONFIG_DIR}   Configuration directory (default ~/.${APP_NAME})
  ${ENV_LOG}          Log file path

${chalk.dim(`version ${VERSION}`)}
`;
}

export function printHelp(): void {
	console.log(helpText());
}
