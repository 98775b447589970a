/**
 * @file 按键解析
 *
 * 将终端发送的原始输入序列解析为按键标识符（KeyId），例如
 * "up"、"shift+left"、"ctrl+q"、"pageDown"。
 *
 * 支持的输入形式：
 * - CSI / SS3 方向键、Home/End、PageUp/PageDown、Delete
 * - 带修饰键参数的 CSI 序列（\x1b[1;2A 即 shift+up）
 * - Ctrl+字母（0x01-0x1a）
 * - ESC 前缀的 Alt 组合键
 */

/**
 * 按键标识符。
 * 格式为可选的修饰键前缀（按 ctrl、alt、shift 的顺序）加按键名，
 * 用 "+" 连接，如 "ctrl+alt+left"。
 */
export type KeyId = string;

/** 括号粘贴起止标记 */
const PASTE_START = "\x1b[200~";
const PASTE_END = "\x1b[201~";

/** 无修饰键的 CSI 序列末字节对应的按键 */
const CSI_LETTER_KEYS: Record<string, string> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
	Z: "shift+tab",
};

/** CSI n ~ 形式的按键 */
const CSI_TILDE_KEYS: Record<string, string> = {
	"1": "home",
	"2": "insert",
	"3": "delete",
	"4": "end",
	"5": "pageUp",
	"6": "pageDown",
	"7": "home",
	"8": "end",
};

/** 非字母的 Ctrl 组合键 */
const SPECIAL_KEYS: Record<string, string> = {
	"\r": "enter",
	"\n": "ctrl+j",
	"\t": "tab",
	"\x7f": "backspace",
	"\b": "backspace",
	"\x1b": "escape",
	"\x00": "ctrl+space",
};

/** 按键名的规范写法（用于规范化用户配置） */
const CANONICAL_NAMES: Record<string, string> = {
	pageup: "pageUp",
	pagedown: "pageDown",
	esc: "escape",
	return: "enter",
	del: "delete",
};

/** 修饰键的规范顺序 */
const MODIFIER_ORDER = ["ctrl", "alt", "shift"];

/** 将 xterm 修饰键参数（1 + 位掩码）转换为修饰键前缀 */
function modifierPrefix(param: number): string {
	const mask = param - 1;
	let prefix = "";
	if (mask & 4) prefix += "ctrl+";
	if (mask & 2) prefix += "alt+";
	if (mask & 1) prefix += "shift+";
	return prefix;
}

/**
 * 将用户书写的按键标识符规范化。
 * 修饰键不区分大小写并按规范顺序排列，按键名转换为规范写法。
 */
export function normalizeKeyId(keyId: KeyId): KeyId {
	const parts = keyId.split("+");
	// "ctrl++" style: the key itself is "+"
	let key = parts.pop() ?? "";
	if (key === "" && parts.length > 0 && parts[parts.length - 1] === "") {
		parts.pop();
		key = "+";
	}
	const modifiers = parts.map((m) => m.toLowerCase()).filter((m) => MODIFIER_ORDER.includes(m));
	modifiers.sort((a, b) => MODIFIER_ORDER.indexOf(a) - MODIFIER_ORDER.indexOf(b));

	const lower = key.length > 1 ? key.toLowerCase() : key;
	const name = CANONICAL_NAMES[lower] ?? lower;
	return [...modifiers, name].join("+");
}

/**
 * 解析一个完整的输入序列。
 * 普通可打印文本与括号粘贴返回 undefined。
 */
export function parseKey(data: string): KeyId | undefined {
	if (data.length === 0) {
		return undefined;
	}

	const special = SPECIAL_KEYS[data];
	if (special) {
		return special;
	}

	// Ctrl+letter
	if (data.length === 1) {
		const code = data.charCodeAt(0);
		if (code >= 1 && code <= 26) {
			return `ctrl+${String.fromCharCode(code + 96)}`;
		}
		if (code === 0x1c) return "ctrl+\\";
		if (code === 0x1d) return "ctrl+]";
		if (code === 0x1f) return "ctrl+-";
		return undefined;
	}

	if (!data.startsWith("\x1b") || data.startsWith(PASTE_START)) {
		return undefined;
	}

	// SS3: ESC O <letter>
	if (data.length === 3 && data[1] === "O") {
		return CSI_LETTER_KEYS[data.charAt(2)];
	}

	if (data[1] === "[") {
		return parseCsi(data.slice(2));
	}

	// Alt+key: ESC followed by a key
	const inner = parseKey(data.slice(1));
	if (inner !== undefined) {
		return normalizeKeyId(`alt+${inner}`);
	}
	const rest = data.slice(1);
	if (isPrintable(rest)) {
		return `alt+${rest}`;
	}
	return undefined;
}

/** 解析 CSI 参数与末字节（不含 ESC [ 前缀） */
function parseCsi(body: string): KeyId | undefined {
	const match = /^([\d;]*)([A-Za-z~])$/.exec(body);
	if (!match) {
		return undefined;
	}
	const params = (match[1] ?? "").split(";").filter((p) => p.length > 0);
	const final = match[2] ?? "";

	let key: string | undefined;
	let modifierParam = 1;
	if (final === "~") {
		key = CSI_TILDE_KEYS[params[0] ?? ""];
		modifierParam = Number(params[1] ?? "1");
	} else {
		key = CSI_LETTER_KEYS[final];
		modifierParam = Number(params[1] ?? "1");
	}

	if (key === undefined || !Number.isInteger(modifierParam) || modifierParam < 1) {
		return undefined;
	}
	if (modifierParam === 1) {
		return key;
	}
	return normalizeKeyId(modifierPrefix(modifierParam) + key);
}

/** 检查输入是否与给定按键标识符匹配 */
export function matchesKey(data: string, keyId: KeyId): boolean {
	const parsed = parseKey(data);
	return parsed !== undefined && parsed === normalizeKeyId(keyId);
}

/** 检查输入是否为可直接插入的文本（不含任何控制字符） */
export function isPrintable(data: string): boolean {
	if (data.length === 0) {
		return false;
	}
	for (let i = 0; i < data.length; i++) {
		const code = data.charCodeAt(i);
		if (code < 0x20 || code === 0x7f || (code >= 0x80 && code < 0xa0)) {
			return false;
		}
	}
	return true;
}

/** 若输入为括号粘贴，返回粘贴的内容 */
export function extractPaste(data: string): string | undefined {
	if (data.startsWith(PASTE_START) && data.endsWith(PASTE_END)) {
		return data.slice(PASTE_START.length, data.length - PASTE_END.length);
	}
	return undefined;
}
