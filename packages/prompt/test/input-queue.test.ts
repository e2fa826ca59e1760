import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import { InputQueue } from "../src/input-queue.js";

describe("InputQueue", () => {
	let queue: InputQueue;

	beforeEach(() => {
		queue = new InputQueue();
	});

	it("should hand out code points in arrival order across chunks", async () => {
		queue.data("ab");
		queue.data("c");
		assert.strictEqual(await queue.read(), "a");
		assert.strictEqual(await queue.read(), "b");
		assert.strictEqual(await queue.read(), "c");
	});

	it("should report buffered input only within the current chunk", async () => {
		queue.data("ab");
		queue.data("c");
		await queue.read();
		assert.strictEqual(queue.hasBuffered(), true);
		await queue.read();
		assert.strictEqual(queue.hasBuffered(), false);
		assert.strictEqual(await queue.read(), "c");
		assert.strictEqual(queue.hasBuffered(), false);
	});

	it("should keep surrogate pairs together", async () => {
		queue.data("😀x");
		assert.strictEqual(await queue.read(), "😀");
		assert.strictEqual(await queue.read(), "x");
	});

	it("should ignore empty chunks", () => {
		queue.data("");
		assert.strictEqual(queue.hasBuffered(), false);
	});

	it("should resolve a pending read when data arrives", async () => {
		const pending = queue.read();
		queue.data("z");
		assert.strictEqual(await pending, "z");
	});

	it("should resolve with null once input has ended and the buffer is drained", async () => {
		queue.data("q");
		queue.end();
		assert.strictEqual(await queue.read(), "q");
		assert.strictEqual(await queue.read(), null);
		assert.strictEqual(await queue.read(), null);
	});

	it("should resolve a pending read with null on end", async () => {
		const pending = queue.read();
		queue.end();
		assert.strictEqual(await pending, null);
	});

	it("should reject with the read failure verbatim", async () => {
		const failure = new Error("read failed");
		const pending = queue.read();
		queue.error(failure);
		await assert.rejects(pending, (error) => error === failure);
	});

	it("should serve buffered input before reporting a failure", async () => {
		const failure = new Error("read failed");
		queue.data("k");
		queue.error(failure);
		assert.strictEqual(await queue.read(), "k");
		await assert.rejects(queue.read(), (error) => error === failure);
	});

	it("should put a code point back into the current chunk", async () => {
		queue.data("ab");
		assert.strictEqual(await queue.read(), "a");
		assert.strictEqual(await queue.read(), "b");
		queue.unread("b");
		assert.strictEqual(queue.hasBuffered(), true);
		assert.strictEqual(await queue.read(), "b");
		assert.strictEqual(queue.hasBuffered(), false);
	});

	it("should put a code point back when nothing is buffered", async () => {
		queue.unread("x");
		queue.end();
		assert.strictEqual(await queue.read(), "x");
		assert.strictEqual(await queue.read(), null);
	});
});
