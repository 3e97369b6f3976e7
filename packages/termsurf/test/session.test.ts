import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import { cell } from "../src/cell.js";
import { point } from "../src/geometry.js";
import { Key } from "../src/keys.js";
import { TerminalSession } from "../src/session.js";
import { VirtualTerminal } from "./virtual-terminal.js";

describe("TerminalSession", () => {
	let terminal: VirtualTerminal;
	let session: TerminalSession;

	beforeEach(() => {
		terminal = new VirtualTerminal(8, 3);
		session = new TerminalSession(terminal, { keyboard: { escapeTimeout: 5 } });
	});

	it("open starts the terminal, hides the cursor and clears", () => {
		session.open();
		assert.ok(session.isOpen);
		assert.ok(terminal.started);
		assert.deepStrictEqual(terminal.writes, ["\x1b[?25l", "\x1b[0m", "\x1b[2J\x1b[H"]);
		assert.strictEqual(session.screen.cursorVisible, false);
	});

	it("routes terminal input to the keyboard", async () => {
		session.open();
		terminal.sendInput("\x1b[A");
		assert.deepStrictEqual(await session.keyboard.waitForKey(100), { type: "key", code: Key.up });
	});

	it("routes resize notifications to the screen", async () => {
		session.open();
		const resized = session.screen.waitForResize();
		terminal.resize(9, 4);
		assert.strictEqual((await resized).toString(), "0, 0, 9, 4");
	});

	it("paints layers added to its screen", async () => {
		session.open();
		const label = session.compositor.createSurface(2, 1);
		label.fill(cell("o"));
		session.screen.addLayer(label, point(3, 1));
		label.render();
		// open() clears, so the first frame repaints every cell
		assert.deepStrictEqual(await terminal.flushAndGetViewport(), ["        ", "   oo   ", "        "]);
	});

	it("close restores the terminal and fails pending key waits", async () => {
		session.open();
		const pending = session.keyboard.waitForKey();
		terminal.clearWrites();
		session.close();

		assert.ok(!session.isOpen);
		assert.ok(!terminal.started);
		assert.deepStrictEqual(terminal.writes, ["\x1b[0m", "\x1b[2J\x1b[H", "\x1b[?25h"]);
		const result = await pending;
		assert.ok(result.type === "error");
		assert.strictEqual(result.error.message, "Session closed");
	});

	it("close before open does nothing", () => {
		session.close();
		assert.deepStrictEqual(terminal.writes, []);
	});

	it("cannot be opened twice or reopened", () => {
		session.open();
		assert.throws(() => session.open(), /Cannot open a session that is open/);
		session.close();
		assert.throws(() => session.open(), /Cannot open a session that is closed/);
	});

	describe("run", () => {
		it("returns the result and closes", async () => {
			const result = await session.run(async (s) => {
				assert.ok(s.isOpen);
				return 42;
			});
			assert.strictEqual(result, 42);
			assert.ok(!terminal.started);
		});

		it("closes when the callback throws", async () => {
			await assert.rejects(
				session.run(() => {
					throw new Error("boom");
				}),
				/boom/,
			);
			assert.ok(!session.isOpen);
			assert.ok(!terminal.started);
		});
	});
});
