/**
 * @file 编辑器包入口
 *
 * 导出文档模型（Line、Buffer）、查找、视图组件和编辑器控制器。
 */

// 注解
export { ANNOTATION_PRECEDENCE, type Annotation, type AnnotationType, dominantAnnotation } from "./annotation/annotation.js";
export {
	AnnotatedStringIterator,
	type AnnotatedStringIteratorOptions,
	type AnnotatedStringPart,
} from "./annotation/annotated-string-iterator.js";
// 命令行
export { type Args, helpText, parseArgs, printHelp } from "./cli/args.js";
// 命令
export { type Command, commandFromInput, type EditCommand, type MoveCommand, type MoveDirection, type SystemCommand } from "./commands.js";
// 组件
export { CommandBar } from "./components/command-bar.js";
export { DEFAULT_MESSAGE_TIMEOUT_MS, MessageBar, type MessageBarOptions } from "./components/message-bar.js";
export { formatStatus, StatusBar } from "./components/status-bar.js";
// 配置
export {
	APP_NAME,
	CONFIG_DIR_NAME,
	ENV_CONFIG_DIR,
	ENV_LOG,
	expandTilde,
	getConfigDir,
	getLogPath,
	getSettingsPath,
	getWelcomeMessage,
	VERSION,
} from "./config.js";
export { type DocumentStatus, lineCountText, modifiedIndicator, positionIndicator } from "./document-status.js";
// 编辑器
export { Editor, type EditorOptions, formatKeyId, type PromptType, SAVE_PROMPT, SEARCH_PROMPT } from "./editor.js";
// 行
export { type GraphemeWidth, graphemeDisplayWidth } from "./line/grapheme-width.js";
export { Line, type LineMatch } from "./line/line.js";
export { fragmentEnd, fragmentText, type TextFragment, textFragmentsOf } from "./line/text-fragment.js";
// 日志
export { initLogging, type LoggingOptions, type LogLevel, logDebug, logError, logInfo, logWarning } from "./log.js";
export { main } from "./main.js";
// 查找
export { findMatches, SearchEngine, type SearchSnapshot, type SearchState } from "./search/search-engine.js";
export { matchLocation, SearchInfo, type SearchMatch } from "./search/search-info.js";
// 设置
export { DEFAULT_SETTINGS, loadSettings, parseSettings, type Settings, SettingsSchema } from "./settings.js";
export { defaultTheme, type EditorTheme, plainTheme } from "./theme.js";
export { type ColumnRange, compareLocations, type LineSource, type Location, type Viewport } from "./types.js";
// 视图
export { Buffer, FileAccessError, splitLines } from "./view/buffer.js";
export { FileInfo, NO_NAME } from "./view/file-info.js";
export { Selection } from "./view/selection.js";
export { buildWelcomeLine, View, type ViewOptions } from "./view/view.js";
export { type AnnotationProvider, centerOn, projectViewport, scrollToReveal, type VisibleRow } from "./view/viewport.js";
