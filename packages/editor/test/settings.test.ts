import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { DEFAULT_SETTINGS, loadSettings, parseSettings } from "../src/settings.js";

describe("parseSettings", () => {
	it("uses the defaults for an empty object", () => {
		assert.deepStrictEqual(parseSettings({}), { settings: DEFAULT_SETTINGS, errors: [] });
	});

	it("takes the values it is given", () => {
		const { settings, errors } = parseSettings({
			quitTimes: 1,
			logLevel: "debug",
			keybindings: { search: "ctrl+g", save: ["ctrl+s", "ctrl+w"] },
		});
		assert.deepStrictEqual(errors, []);
		assert.deepStrictEqual(settings, {
			quitTimes: 1,
			messageTimeoutMs: 5000,
			logLevel: "debug",
			keybindings: { search: "ctrl+g", save: ["ctrl+s", "ctrl+w"] },
		});
	});

	it("rejects out of range values", () => {
		const { settings, errors } = parseSettings({ quitTimes: 0 });
		assert.deepStrictEqual(settings, DEFAULT_SETTINGS);
		assert.ok(errors.length > 0);
		assert.ok(errors.every((error) => error.startsWith("/quitTimes: ")));
	});

	it("rejects unknown settings", () => {
		const { errors } = parseSettings({ colour: "red" });
		assert.ok(errors.some((error) => error.startsWith("/colour: ")));
	});

	it("rejects values that are not objects", () => {
		const { settings, errors } = parseSettings([]);
		assert.deepStrictEqual(settings, DEFAULT_SETTINGS);
		assert.ok(errors.length > 0);
	});

	it("reports bindings for unknown actions and keeps the rest", () => {
		const { settings, errors } = parseSettings({ keybindings: { teleport: "ctrl+t", quit: "ctrl+x" } });
		assert.deepStrictEqual(errors, ["/keybindings/teleport: unknown action"]);
		assert.deepStrictEqual(settings.keybindings, { quit: "ctrl+x" });
	});
});

describe("loadSettings", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "glyph-settings-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("uses the defaults when there is no file", () => {
		assert.deepStrictEqual(loadSettings(join(dir, "settings.json")), { settings: DEFAULT_SETTINGS, errors: [] });
	});

	it("reads a settings file", () => {
		const path = join(dir, "settings.json");
		writeFileSync(path, JSON.stringify({ messageTimeoutMs: 2000 }));
		assert.strictEqual(loadSettings(path).settings.messageTimeoutMs, 2000);
	});

	it("reports a file that is not JSON", () => {
		const path = join(dir, "settings.json");
		writeFileSync(path, "{ quitTimes: ");
		const { settings, errors } = loadSettings(path);
		assert.deepStrictEqual(settings, DEFAULT_SETTINGS);
		assert.strictEqual(errors.length, 1);
		assert.ok(errors[0]?.startsWith(`${path}: `));
	});
});
