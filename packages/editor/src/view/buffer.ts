/**
 * @file 文档缓冲区
 *
 * Buffer 持有文档的全部行，以及关联的文件与修改标记。
 * 光标位置允许停在最后一行之后的虚拟行上（lineIndex === lineCount），
 * 在那里插入内容会追加新行。
 */

import { readFile, writeFile } from "fs/promises";
import { Line } from "../line/line.js";
import { compareLocations, type Location } from "../types.js";
import { FileInfo } from "./file-info.js";

/** 读写文件失败 */
export class FileAccessError extends Error {
	constructor(
		message: string,
		readonly path: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "FileAccessError";
	}
}

/** 按换行拆分文件内容；末尾的换行不产生额外的空行 */
export function splitLines(content: string): string[] {
	if (content.length === 0) {
		return [];
	}
	const lines = content.split(/\r?\n/);
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines;
}

export class Buffer {
	private lineList: Line[];
	private info: FileInfo;
	private dirty = false;

	constructor(lines: Line[] = [], fileInfo: FileInfo = new FileInfo()) {
		this.lineList = lines;
		this.info = fileInfo;
	}

	static fromLines(texts: readonly string[], path?: string): Buffer {
		return new Buffer(
			texts.map((text) => new Line(text)),
			new FileInfo(path),
		);
	}

	/** 从文件加载，失败时抛出 FileAccessError */
	static async load(path: string): Promise<Buffer> {
		let content: string;
		try {
			content = await readFile(path, "utf8");
		} catch (error) {
			throw new FileAccessError(`Could not open file: ${path}`, path, { cause: error });
		}
		return Buffer.fromLines(splitLines(content), path);
	}

	get lines(): readonly Line[] {
		return this.lineList;
	}

	get fileInfo(): FileInfo {
		return this.info;
	}

	get isDirty(): boolean {
		return this.dirty;
	}

	lineCount(): number {
		return this.lineList.length;
	}

	getLine(lineIndex: number): Line | undefined {
		return this.lineList[lineIndex];
	}

	isEmpty(): boolean {
		return this.lineList.length === 0;
	}

	toLines(): string[] {
		return this.lineList.map((line) => line.toString());
	}

	/** 保存到关联的文件 */
	async save(): Promise<void> {
		const path = this.info.path;
		if (path === undefined) {
			throw new FileAccessError("No file name", "");
		}
		await this.saveToFile(path);
	}

	/** 另存为新文件，成功后关联到该文件 */
	async saveAs(path: string): Promise<void> {
		await this.saveToFile(path);
		this.info = new FileInfo(path);
	}

	private async saveToFile(path: string): Promise<void> {
		const content = this.lineList.map((line) => `${line.toString()}\n`).join("");
		try {
			await writeFile(path, content, "utf8");
		} catch (error) {
			throw new FileAccessError(`Could not write file: ${path}`, path, { cause: error });
		}
		this.dirty = false;
	}

	/** 确保 lineIndex 处有一行可供编辑；越过末尾时追加空行 */
	private lineForEdit(lineIndex: number): Line | undefined {
		if (lineIndex === this.lineList.length) {
			const line = new Line();
			this.lineList.push(line);
			return line;
		}
		return this.lineList[lineIndex];
	}

	/**
	 * 在位置处插入文本（可包含换行），返回插入内容之后的位置。
	 * 位置越界时不做任何事并原样返回。
	 */
	insertText(text: string, at: Location): Location {
		if (text.length === 0 || at.lineIndex < 0 || at.lineIndex > this.lineList.length) {
			return at;
		}
		const line = this.lineForEdit(at.lineIndex);
		if (!line) {
			return at;
		}
		this.dirty = true;

		const parts = text.split(/\r\n|\r|\n/);
		if (parts.length === 1) {
			const before = line.graphemeCount();
			line.insert(at.graphemeIndex, text);
			const inserted = Math.max(0, line.graphemeCount() - before);
			return { lineIndex: at.lineIndex, graphemeIndex: Math.min(at.graphemeIndex, before) + inserted };
		}

		const tail = line.splitAt(at.graphemeIndex);
		line.appendText(parts[0] ?? "");
		const newLines = parts.slice(1).map((part) => new Line(part));
		const last = newLines[newLines.length - 1] ?? new Line();
		const graphemeIndex = last.graphemeCount();
		last.append(tail);
		this.lineList.splice(at.lineIndex + 1, 0, ...newLines);
		return { lineIndex: at.lineIndex + newLines.length, graphemeIndex };
	}

	/** 在位置处断行：尾部移到新的下一行 */
	insertNewline(at: Location): void {
		if (at.lineIndex < 0 || at.lineIndex > this.lineList.length) {
			return;
		}
		this.dirty = true;
		const line = this.lineList[at.lineIndex];
		if (!line) {
			this.lineList.push(new Line());
			return;
		}
		const tail = line.splitAt(at.graphemeIndex);
		this.lineList.splice(at.lineIndex + 1, 0, tail);
	}

	/** 删除位置处的字位簇；位于行尾时把下一行合并进来 */
	delete(at: Location): void {
		const line = this.lineList[at.lineIndex];
		if (!line) {
			return;
		}
		if (at.graphemeIndex >= line.graphemeCount()) {
			const next = this.lineList[at.lineIndex + 1];
			if (next) {
				line.append(next);
				this.lineList.splice(at.lineIndex + 1, 1);
				this.dirty = true;
			}
			return;
		}
		line.delete(at.graphemeIndex);
		this.dirty = true;
	}

	/** 删除 [from, to) 之间的文本，可跨行；参数顺序无关 */
	deleteRange(from: Location, to: Location): void {
		const [start, end] = compareLocations(from, to) <= 0 ? [from, to] : [to, from];
		const first = this.lineList[start.lineIndex];
		if (!first || compareLocations(start, end) === 0) {
			return;
		}
		this.dirty = true;

		if (start.lineIndex === end.lineIndex) {
			first.deleteRange(start.graphemeIndex, end.graphemeIndex);
			return;
		}

		first.splitAt(start.graphemeIndex);
		const last = this.lineList[end.lineIndex];
		if (last) {
			first.append(last.splitAt(end.graphemeIndex));
		}
		this.lineList.splice(start.lineIndex + 1, Math.min(end.lineIndex, this.lineList.length - 1) - start.lineIndex);
	}
}
