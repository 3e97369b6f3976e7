import assert from "node:assert";
import { describe, it } from "node:test";
import { formatKey, Key, matchesKey, Modifier, parseKeyId, splitKey, XTERM_KEYMAP } from "../src/keys.js";

describe("Modifier", () => {
	it("steps by the xterm modifier parameter", () => {
		assert.strictEqual(Modifier.shift, 2 * Modifier.meta);
		assert.strictEqual(Modifier.alt, 3 * Modifier.meta);
		assert.strictEqual(Modifier.ctrl, 5 * Modifier.meta);
		assert.strictEqual(Modifier.shiftAltCtrl, 8 * Modifier.meta);
	});
});

describe("splitKey", () => {
	it("separates bytes from their modifier", () => {
		assert.deepStrictEqual(splitKey(0x78 + Modifier.alt), { key: 0x78, step: 3 });
	});

	it("separates named keys from their modifier", () => {
		assert.deepStrictEqual(splitKey(Key.pageDown + Modifier.shiftCtrl), { key: Key.pageDown, step: 6 });
		assert.deepStrictEqual(splitKey(Key.f1), { key: Key.f1, step: 0 });
	});
});

describe("formatKey", () => {
	it("names special keys", () => {
		assert.strictEqual(formatKey(Key.up), "up");
		assert.strictEqual(formatKey(Key.enter), "enter");
		assert.strictEqual(formatKey(Key.f12), "f12");
		assert.strictEqual(formatKey(Key.escapeSequence), "escapeSequence");
	});

	it("names printable bytes by their character", () => {
		assert.strictEqual(formatKey(0x41), "A");
		assert.strictEqual(formatKey(0x20), "space");
	});

	it("names other bytes in hex", () => {
		assert.strictEqual(formatKey(0x01), "0x01");
		assert.strictEqual(formatKey(0xc3), "0xc3");
	});

	it("prefixes modifiers", () => {
		assert.strictEqual(formatKey(Key.up + Modifier.shift), "shift+up");
		assert.strictEqual(formatKey(Key.left + Modifier.meta), "meta+left");
		assert.strictEqual(formatKey(0x78 + Modifier.alt), "alt+x");
		assert.strictEqual(formatKey(Key.f12 + Modifier.shiftAltCtrl), "shift+alt+ctrl+f12");
	});

	it("returns undefined outside the known ranges", () => {
		assert.strictEqual(formatKey(-1), undefined);
		assert.strictEqual(formatKey(500), undefined);
		assert.strictEqual(formatKey(Key.f1 + 9 * Modifier.meta), undefined);
		assert.strictEqual(formatKey(Key.escapeSequence + 1), undefined);
	});
});

describe("parseKeyId", () => {
	it("reads plain and modified names", () => {
		assert.strictEqual(parseKeyId("pageUp"), Key.pageUp);
		assert.strictEqual(parseKeyId("shift+up"), Key.up + Modifier.shift);
		assert.strictEqual(parseKeyId("alt+ctrl+delete"), Key.delete + Modifier.altCtrl);
		assert.strictEqual(parseKeyId("ctrl+a"), 0x61 + Modifier.ctrl);
	});

	it("reads the plus key", () => {
		assert.strictEqual(parseKeyId("+"), 0x2b);
		assert.strictEqual(parseKeyId("alt++"), 0x2b + Modifier.alt);
	});

	it("reads hex bytes", () => {
		assert.strictEqual(parseKeyId("0x1b"), Key.escape);
	});

	it("rejects unknown names", () => {
		assert.strictEqual(parseKeyId("hyper+a"), undefined);
		assert.strictEqual(parseKeyId("shift+nothing"), undefined);
		assert.strictEqual(parseKeyId(""), undefined);
	});

	it("reads back what formatKey writes", () => {
		for (const code of [Key.tab, Key.home + Modifier.ctrl, 0x2b + Modifier.alt, 0x7e, Key.f5 + Modifier.meta]) {
			const name = formatKey(code);
			assert.ok(name !== undefined);
			assert.strictEqual(parseKeyId(name), code, name);
		}
	});
});

describe("matchesKey", () => {
	it("compares a code with a key id", () => {
		assert.ok(matchesKey(Key.enter + Modifier.alt, "alt+enter"));
		assert.ok(!matchesKey(Key.enter, "alt+enter"));
		assert.ok(matchesKey(0x71, "q"));
	});
});

describe("XTERM_KEYMAP", () => {
	function resolve(terminator: string, params: number[]): number | undefined {
		return XTERM_KEYMAP.map.get(terminator)?.(params);
	}

	it("resolves tilde sequences", () => {
		assert.strictEqual(resolve("~", [2]), Key.insert);
		assert.strictEqual(resolve("~", [24]), Key.f12);
		assert.strictEqual(resolve("~", [3, 2]), Key.delete + Modifier.shift);
	});

	it("ignores a tilde modifier outside 1-8", () => {
		assert.strictEqual(resolve("~", [5, 9]), Key.pageUp);
	});

	it("maps malformed tilde sequences to unknown", () => {
		assert.strictEqual(resolve("~", []), Key.unknown);
		assert.strictEqual(resolve("~", [4]), Key.unknown);
		assert.strictEqual(resolve("~", [1, 2, 3]), Key.unknown);
	});

	it("resolves letter terminators with an optional modifier", () => {
		assert.strictEqual(resolve("A", []), Key.up);
		assert.strictEqual(resolve("F", [1, 5]), Key.end + Modifier.ctrl);
		assert.strictEqual(resolve("S", []), Key.f4);
		assert.strictEqual(resolve("D", [1, 9]), Key.unknown);
	});

	it("has no entry for other terminators", () => {
		assert.strictEqual(resolve("Z", []), undefined);
	});
});
