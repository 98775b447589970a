/**
 * @file 用户设置
 *
 * 从 <configDir>/settings.json 读取设置并用 TypeBox 校验。
 * 文件不存在时使用默认值；文件无效时报告错误并回退到默认值。
 */

import { existsSync, readFileSync } from "fs";
import { EDITOR_ACTIONS, type EditorAction, type EditorKeybindingsConfig } from "@glyph-editor/tui";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_MESSAGE_TIMEOUT_MS } from "./components/message-bar.js";
import { getSettingsPath } from "./config.js";
import type { LogLevel } from "./log.js";

const KeyIdsSchema = Type.Union([Type.String(), Type.Array(Type.String())]);

export const SettingsSchema = Type.Object(
	{
		/** 文档有未保存修改时，退出需要连按的次数 */
		quitTimes: Type.Optional(Type.Integer({ minimum: 1 })),
		/** 消息栏消息的显示时长 */
		messageTimeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
		logLevel: Type.Optional(
			Type.Union([Type.Literal("debug"), Type.Literal("info"), Type.Literal("warning"), Type.Literal("error")]),
		),
		/** 动作名 → 按键标识符（单个或数组） */
		keybindings: Type.Optional(Type.Record(Type.String(), KeyIdsSchema)),
	},
	{ additionalProperties: false },
);

export type SettingsFile = Static<typeof SettingsSchema>;

export interface Settings {
	quitTimes: number;
	messageTimeoutMs: number;
	logLevel: LogLevel;
	keybindings: EditorKeybindingsConfig;
}

export const DEFAULT_SETTINGS: Settings = {
	quitTimes: 3,
	messageTimeoutMs: DEFAULT_MESSAGE_TIMEOUT_MS,
	logLevel: "info",
	keybindings: {},
};

export interface SettingsLoadResult {
	settings: Settings;
	/** 校验或读取错误，每条一行 */
	errors: string[];
}

function isEditorAction(name: string): name is EditorAction {
	return EDITOR_ACTIONS.some((action) => action === name);
}

/** 校验已解析的 JSON 值 */
export function parseSettings(value: unknown): SettingsLoadResult {
	if (!Value.Check(SettingsSchema, value)) {
		const errors = [...Value.Errors(SettingsSchema, value)].map((error) => `${error.path || "/"}: ${error.message}`);
		return { settings: { ...DEFAULT_SETTINGS }, errors };
	}

	const errors: string[] = [];
	const keybindings: EditorKeybindingsConfig = {};
	for (const [name, keys] of Object.entries(value.keybindings ?? {})) {
		if (isEditorAction(name)) {
			keybindings[name] = keys;
		} else {
			errors.push(`/keybindings/${name}: unknown action`);
		}
	}

	return {
		settings: {
			quitTimes: value.quitTimes ?? DEFAULT_SETTINGS.quitTimes,
			messageTimeoutMs: value.messageTimeoutMs ?? DEFAULT_SETTINGS.messageTimeoutMs,
			logLevel: value.logLevel ?? DEFAULT_SETTINGS.logLevel,
			keybindings,
		},
		errors,
	};
}

/** 读取设置文件 */
export function loadSettings(path: string = getSettingsPath()): SettingsLoadResult {
	if (!existsSync(path)) {
		return { settings: { ...DEFAULT_SETTINGS }, errors: [] };
	}
	let value: unknown;
	try {
		value = JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		return { settings: { ...DEFAULT_SETTINGS }, errors: [`${path}: ${reason}`] };
	}
	return parseSettings(value);
}
