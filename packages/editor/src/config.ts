/**
 * 应用配置与路径管理模块
 *
 * 职责：
 * - 从 package.json 中读取应用配置（名称、配置目录名、版本号）
 * - 提供用户配置目录下各种文件的路径（设置、日志）
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// =============================================================================
// 包资源路径
// =============================================================================

/** 获取包根目录：从当前文件所在目录向上查找 package.json */
export function getPackageDir(): string {
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	return __dirname;
}

/** 获取 package.json 路径 */
export function getPackageJsonPath(): string {
	return join(getPackageDir(), "package.json");
}

// =============================================================================
// 应用配置（来自 package.json 的 glyphConfig 字段）
// =============================================================================

const PackageJsonSchema = Type.Object({
	version: Type.String(),
	glyphConfig: Type.Optional(
		Type.Object({
			name: Type.Optional(Type.String()),
			configDir: Type.Optional(Type.String()),
		}),
	),
});

function readPackageJson(): { name: string; configDir: string; version: string } {
	const pkg: unknown = JSON.parse(readFileSync(getPackageJsonPath(), "utf-8"));
	if (!Value.Check(PackageJsonSchema, pkg)) {
		return { name: "glyph", configDir: ".glyph", version: "0.0.0" };
	}
	return {
		name: pkg.glyphConfig?.name || "glyph",
		configDir: pkg.glyphConfig?.configDir || ".glyph",
		version: pkg.version,
	};
}

const pkg = readPackageJson();

/** 应用名称（默认 "glyph"） */
export const APP_NAME: string = pkg.name;
/** 配置目录名称（默认 ".glyph"） */
export const CONFIG_DIR_NAME: string = pkg.configDir;
/** 当前版本号 */
export const VERSION: string = pkg.version;

// 环境变量名，例如 GLYPH_CONFIG_DIR、GLYPH_LOG
export const ENV_CONFIG_DIR = `${APP_NAME.toUpperCase()}_CONFIG_DIR`;
export const ENV_LOG = `${APP_NAME.toUpperCase()}_LOG`;

/** 展开路径开头的 ~ */
export function expandTilde(path: string): string {
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return homedir() + path.slice(1);
	return path;
}

// =============================================================================
// 用户配置路径 (~/.glyph/*)
// =============================================================================

/** 获取配置目录（例如 ~/.glyph/），支持通过环境变量覆盖 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
	const envDir = env[ENV_CONFIG_DIR];
	if (envDir) {
		return expandTilde(envDir);
	}
	return join(homedir(), CONFIG_DIR_NAME);
}

/** 获取 settings.json 路径 */
export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
	return join(getConfigDir(env), "settings.json");
}

/** 获取日志文件路径，支持通过环境变量覆盖 */
export function getLogPath(env: NodeJS.ProcessEnv = process.env): string {
	const envLog = env[ENV_LOG];
	if (envLog) {
		return expandTilde(envLog);
	}
	return join(getConfigDir(env), `${APP_NAME}.log`);
}

/** 欢迎信息 */
export function getWelcomeMessage(): string {
	return `${APP_NAME} editor -- version ${VERSION}`;
}
