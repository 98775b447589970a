/**
 * @file 文本宽度工具集
 *
 * 提供终端文本渲染所需的宽度计算工具，包括：
 * - 单个字位簇的显示宽度（正确处理 CJK 字符、Emoji、组合字符）
 * - 字符串的可见宽度（忽略 ANSI 转义码）
 * - 按宽度截断与填充（保留 ANSI 样式）
 */

import { eastAsianWidth } from "get-east-asian-width";

/** 字位分割器（共享实例，用于正确处理 Unicode 字符） */
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** 获取共享的字位分割器实例 */
export function getSegmenter(): Intl.Segmenter {
	return segmenter;
}

/** 将文本分割为字位簇及其起始偏移（UTF-16 码元） */
export function segmentGraphemes(text: string): { segment: string; index: number }[] {
	const result: { segment: string; index: number }[] = [];
	for (const { segment, index } of segmenter.segment(text)) {
		result.push({ segment, index });
	}
	return result;
}

/** 零宽度字符匹配正则 */
const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
/** 前导不可见字符匹配正则 */
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;
/** 默认以 Emoji 样式呈现的字符 */
const emojiPresentationRegex = /^\p{Emoji_Presentation}/u;
/** 可通过 VS16 切换为 Emoji 样式的字符 */
const pictographicRegex = /^\p{Extended_Pictographic}/u;

/** 控制字符匹配正则（C0、DEL、C1） */
const controlRegex = /^\p{Control}$/u;

/** 检查字位簇是否为单个控制字符 */
export function isControlGrapheme(segment: string): boolean {
	return controlRegex.test(segment);
}

/**
 * 快速判断字位簇是否按 Emoji 宽度（2 列）显示。
 * 这是对 RGI Emoji 检测的近似：Emoji_Presentation 基字符，
 * 或带 VS16 / ZWJ 的图形字符序列。
 */
function isWideEmoji(segment: string): boolean {
	if (emojiPresentationRegex.test(segment)) {
		return true;
	}
	return pictographicRegex.test(segment) && (segment.includes("\uFE0F") || segment.includes("\u200D"));
}

// 非 ASCII 字位簇的宽度缓存
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * 计算单个字位簇的终端显示宽度（0、1 或 2 列）。
 * 基于 string-width 库的算法，未分配或未知的码点按 1 列处理。
 */
export function graphemeWidth(segment: string): 0 | 1 | 2 {
	if (segment.length === 0) {
		return 0;
	}
	const first = segment.charCodeAt(0);
	if (segment.length === 1 && first >= 0x20 && first <= 0x7e) {
		return 1;
	}

	const cached = widthCache.get(segment);
	if (cached !== undefined) {
		return clampWidth(cached);
	}

	const width = computeGraphemeWidth(segment);

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(segment, width);
	return clampWidth(width);
}

function computeGraphemeWidth(segment: string): number {
	// Zero-width clusters
	if (zeroWidthRegex.test(segment)) {
		return 0;
	}

	if (isWideEmoji(segment)) {
		return 2;
	}

	// Get base visible codepoint
	const base = segment.replace(leadingNonPrintingRegex, "");
	const cp = base.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}

	let width = eastAsianWidth(cp);

	// Trailing halfwidth/fullwidth forms
	for (const char of base.slice(String.fromCodePoint(cp).length)) {
		const c = char.codePointAt(0);
		if (c !== undefined && c >= 0xff00 && c <= 0xffef) {
			width += eastAsianWidth(c);
		}
	}

	return width;
}

function clampWidth(width: number): 0 | 1 | 2 {
	if (width <= 0) return 0;
	return width >= 2 ? 2 : 1;
}

/** 匹配 SGR 与光标控制序列 */
const ansiRegex = /\x1b\[[0-9;]*[mGKHJ]/g;

/** 移除字符串中的 ANSI 转义码 */
export function stripAnsi(str: string): string {
	return str.includes("\x1b") ? str.replace(ansiRegex, "") : str;
}

/** 计算字符串在终端中的可见宽度（列数） */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}

	// 快速路径：纯 ASCII 可打印字符
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	let width = 0;
	for (const { segment } of segmenter.segment(stripAnsi(str))) {
		width += graphemeWidth(segment);
	}
	return width;
}

/** 从字符串的指定位置提取 ANSI 转义序列 */
function extractAnsiCode(str: string, pos: number): string | undefined {
	if (str[pos] !== "\x1b" || str[pos + 1] !== "[") return undefined;
	let j = pos + 2;
	while (j < str.length && !/[mGKHJ]/.test(str.charAt(j))) j++;
	return j < str.length ? str.substring(pos, j + 1) : undefined;
}

/**
 * 将文本截断至最大可见宽度，必要时添加省略号。
 * ANSI 转义码不计入宽度，且会被原样保留。
 *
 * @param ellipsis - 截断时追加的字符串（默认 "..."）
 * @param pad - 为 true 时用空格填充至恰好 maxWidth
 */
export function truncateToWidth(text: string, maxWidth: number, ellipsis = "...", pad = false): string {
	if (maxWidth <= 0) {
		return "";
	}

	const textVisibleWidth = visibleWidth(text);

	if (textVisibleWidth <= maxWidth) {
		return pad ? text + " ".repeat(maxWidth - textVisibleWidth) : text;
	}

	const ellipsisWidth = visibleWidth(ellipsis);
	const targetWidth = maxWidth - ellipsisWidth;

	if (targetWidth <= 0) {
		return truncateToWidth(ellipsis, maxWidth, "", pad);
	}

	let result = "";
	let currentWidth = 0;
	let i = 0;
	outer: while (i < text.length) {
		const ansi = extractAnsiCode(text, i);
		if (ansi) {
			result += ansi;
			i += ansi.length;
			continue;
		}

		let end = i;
		while (end < text.length && !extractAnsiCode(text, end)) end++;

		for (const { segment } of segmenter.segment(text.slice(i, end))) {
			const w = graphemeWidth(segment);
			if (currentWidth + w > targetWidth) {
				break outer;
			}
			result += segment;
			currentWidth += w;
		}
		i = end;
	}

	// Reset before the ellipsis so styling does not leak into it
	const truncated = `${result}\x1b[0m${ellipsis}`;
	if (pad) {
		return truncated + " ".repeat(Math.max(0, maxWidth - currentWidth - ellipsisWidth));
	}
	return truncated;
}

/** 用空格将文本右侧填充至指定可见宽度（超出时不截断） */
export function padToWidth(text: string, width: number): string {
	return text + " ".repeat(Math.max(0, width - visibleWidth(text)));
}
