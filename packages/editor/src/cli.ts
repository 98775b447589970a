#!/usr/bin/env node
/**
 * CLI 入口文件 - 编辑器的命令行启动点
 *
 * 测试方式：npx tsx src/cli.ts [file]
 */
process.title = "glyph";

import { main } from "./main.js";

// 去掉 node 和脚本路径，只传递用户提供的参数
main(process.argv.slice(2)).catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
