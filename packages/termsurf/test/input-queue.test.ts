import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import { InputQueue } from "../src/input-queue.js";

describe("InputQueue", () => {
	let queue: InputQueue;

	beforeEach(() => {
		queue = new InputQueue();
	});

	it("returns buffered bytes in order", async () => {
		queue.push("ab");
		assert.deepStrictEqual(await queue.read(), { type: "byte", byte: 0x61 });
		assert.deepStrictEqual(await queue.read(), { type: "byte", byte: 0x62 });
		assert.strictEqual(queue.available, 0);
	});

	it("encodes strings as UTF-8", async () => {
		queue.push("é");
		assert.strictEqual(queue.available, 2);
		assert.deepStrictEqual(await queue.read(), { type: "byte", byte: 0xc3 });
		assert.deepStrictEqual(await queue.read(), { type: "byte", byte: 0xa9 });
	});

	it("accepts buffers", async () => {
		queue.push(Buffer.from([0x1b, 0x5b]));
		queue.push(new Uint8Array([0x41]));
		assert.strictEqual(queue.available, 3);
		assert.deepStrictEqual(await queue.read(), { type: "byte", byte: 0x1b });
	});

	it("wakes a waiting reader on push", async () => {
		const pending = queue.read();
		queue.push("x");
		assert.deepStrictEqual(await pending, { type: "byte", byte: 0x78 });
	});

	it("serves waiting readers first come first served", async () => {
		const first = queue.read();
		const second = queue.read(1000);
		queue.push("12");
		assert.deepStrictEqual(await first, { type: "byte", byte: 0x31 });
		assert.deepStrictEqual(await second, { type: "byte", byte: 0x32 });
	});

	it("polls without waiting when the timeout is 0", async () => {
		assert.deepStrictEqual(await queue.read(0), { type: "timeout" });
	});

	it("times out and leaves later input for the next read", async () => {
		assert.deepStrictEqual(await queue.read(5), { type: "timeout" });
		queue.push("z");
		assert.strictEqual(queue.available, 1);
		assert.deepStrictEqual(await queue.read(0), { type: "byte", byte: 0x7a });
	});

	it("clear drops buffered bytes", async () => {
		queue.push("abc");
		queue.clear();
		assert.strictEqual(queue.available, 0);
		assert.deepStrictEqual(await queue.read(0), { type: "timeout" });
	});

	describe("close", () => {
		it("fails waiting readers", async () => {
			const pending = queue.read(1000);
			queue.close();
			const result = await pending;
			assert.strictEqual(result.type, "error");
			assert.ok(result.type === "error" && result.error.message === "Input closed");
		});

		it("fails later reads with the same error and discards input", async () => {
			const error = new Error("gone");
			queue.push("ab");
			queue.close(error);
			queue.push("c");
			assert.ok(queue.closed);
			assert.strictEqual(queue.available, 0);
			assert.deepStrictEqual(await queue.read(), { type: "error", error });
		});
	});
});
