import assert from "node:assert";
import { describe, it } from "node:test";
import { kinds } from "../src/coerce.js";
import { input } from "../src/components/input.js";
import { InputEndedError, PromptConfigError } from "../src/errors.js";
import { plainTheme } from "../src/theme.js";
import { numRange, strLength } from "../src/validators.js";
import { VirtualTerminal } from "./virtual-terminal.js";

describe("input", () => {
	it("should accept typed text and leave a summary line", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("hello\r");

		const result = await input({ label: "Name", kind: kinds.string(), terminal, theme: plainTheme });

		assert.deepStrictEqual(result, { status: "accepted", value: "hello" });
		assert.deepStrictEqual(await terminal.screen(), ["Name: hello"]);
		assert.strictEqual(terminal.starts, 1);
		assert.strictEqual(terminal.stops, 1);
		assert.strictEqual(terminal.interrupts, 0);
		assert.strictEqual(terminal.cursorHiddenOnStart, false);
	});

	it("should show the prompt with the cursor after the label", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const result = input({ label: "Name", kind: kinds.string(), terminal, theme: plainTheme });

		terminal.sendInput("ab");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: ab"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 8, y: 0 });

		terminal.sendInput("\r");
		assert.deepStrictEqual(await result, { status: "accepted", value: "ab" });
	});

	it("should scroll text wider than the terminal within one row", async () => {
		const terminal = new VirtualTerminal(20, 10);
		const result = input({ label: "Name", kind: kinds.string(), terminal, theme: plainTheme });

		terminal.sendInput("abcdefghijklmnopqrstuvwxyz");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: nopqrstuvwxyz"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 19, y: 0 });

		terminal.sendInput("\x01");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: abcdefghijklm"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 6, y: 0 });

		terminal.sendInput("\r");
		assert.deepStrictEqual(await result, { status: "accepted", value: "abcdefghijklmnopqrstuvwxyz" });
		assert.deepStrictEqual(await terminal.screen(), ["Name: abcdefghijklmn", "opqrstuvwxyz"]);
	});

	it("should edit a pre-filled value from the given cursor", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("hello ", "\r");

		const result = await input({
			label: "Greeting",
			kind: kinds.string(),
			default: "world",
			cursor: 0,
			terminal,
			theme: plainTheme,
		});

		assert.deepStrictEqual(result, { status: "accepted", value: "hello world" });
		assert.deepStrictEqual(await terminal.screen(), ["Greeting: hello world"]);
	});

	it("should report a coercion error above the line and keep the text", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const result = input({ label: "Port", kind: kinds.integer(), terminal, theme: plainTheme });

		terminal.sendInput("abc\r");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["ERROR: invalid integer", "Port: abc"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 9, y: 1 });

		terminal.sendInput("\x15", "42\r");
		assert.deepStrictEqual(await result, { status: "accepted", value: 42 });
		assert.deepStrictEqual(await terminal.screen(), ["Port: 42"]);
	});

	it("should run the validators on the coerced value", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const result = input({
			label: "Level",
			kind: kinds.integer(),
			validators: [numRange(1, 10)],
			terminal,
			theme: plainTheme,
		});

		terminal.sendInput("42\r");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["ERROR: out of range [1,10]", "Level: 42"]);

		terminal.sendInput("\x7f\x7f", "7\r");
		assert.deepStrictEqual(await result, { status: "accepted", value: 7 });
	});

	it("should stop at the first failing validator", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const result = input({
			label: "Code",
			kind: kinds.string(),
			validators: [strLength(2), strLength(0, 1)],
			terminal,
			theme: plainTheme,
		});

		terminal.sendInput("a\r");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["ERROR: too short, minimum is 2", "Code: a"]);

		terminal.sendInput("\x03");
		assert.deepStrictEqual(await result, { status: "cancelled" });
	});

	it("should cancel on Ctrl+C and re-raise the interrupt after restoring", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("ab\x03");

		const result = await input({ label: "Name", kind: kinds.string(), terminal, theme: plainTheme });

		assert.deepStrictEqual(result, { status: "cancelled" });
		assert.deepStrictEqual(await terminal.screen(), ["Name: ^C"]);
		assert.strictEqual(terminal.stops, 1);
		assert.strictEqual(terminal.interrupts, 1);
		assert.strictEqual(terminal.raw, false);
	});

	it("should end without a value on Escape", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("ab", "\x1b");

		const result = await input({ label: "Name", kind: kinds.string(), terminal, theme: plainTheme });

		assert.deepStrictEqual(result, { status: "escaped" });
		assert.deepStrictEqual(await terminal.screen(), ["Name:"]);
		assert.strictEqual(terminal.interrupts, 0);
	});

	it("should submit on end of input", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("last words");
		terminal.sendEnd();

		const result = await input({ label: "Note", kind: kinds.string(), terminal, theme: plainTheme });

		assert.deepStrictEqual(result, { status: "accepted", value: "last words" });
	});

	it("should reject once input has ended and the value is still invalid", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("abc");
		terminal.sendEnd();

		await assert.rejects(
			input({ label: "Port", kind: kinds.integer(), terminal, theme: plainTheme }),
			InputEndedError,
		);
		assert.strictEqual(terminal.stops, 1);
	});

	it("should pass read failures through and restore the terminal", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendError(new Error("read failed"));

		await assert.rejects(input({ label: "Name", kind: kinds.string(), terminal, theme: plainTheme }), {
			message: "read failed",
		});
		assert.strictEqual(terminal.stops, 1);
		assert.strictEqual(terminal.interrupts, 0);
	});

	it("should delegate two-valued kinds to a single-key answer", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("y");

		const result = await input({ label: "Ready", kind: kinds.boolean(), terminal, theme: plainTheme });

		assert.deepStrictEqual(result, { status: "accepted", value: true });
		assert.deepStrictEqual(await terminal.screen(), ["Ready: yes"]);
	});

	it("should reject a bad configuration before touching the terminal", async () => {
		const terminal = new VirtualTerminal(40, 10);

		await assert.rejects(
			input({ label: "Name", kind: kinds.string(), terminal, config: { scrollMargin: -1 } }),
			PromptConfigError,
		);
		assert.strictEqual(terminal.starts, 0);
	});
});
