import assert from "node:assert";
import { describe, it } from "node:test";
import { kinds } from "../src/coerce.js";
import { Form } from "../src/form.js";
import { plainTheme } from "../src/theme.js";
import * as validators from "../src/validators.js";
import { VirtualTerminal } from "./virtual-terminal.js";

describe("Form", () => {
	it("should run every field in order with right-aligned labels", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("alice\r");
		terminal.sendInput("8080\r");
		terminal.sendInput("y");

		let name = "";
		let port = 0;
		let tls = false;
		const result = await new Form({ terminal, theme: plainTheme })
			.print("Server", "example.test")
			.input("Name", { kind: kinds.string() }, (v) => {
				name = v;
			})
			.input("Port", { kind: kinds.integer({ bits: 16, unsigned: true }), validators: [validators.port()] }, (v) => {
				port = v;
			})
			.confirm("TLS", {}, (v) => {
				tls = v;
			})
			.send();

		assert.deepStrictEqual(result, { status: "accepted", value: undefined });
		assert.strictEqual(name, "alice");
		assert.strictEqual(port, 8080);
		assert.strictEqual(tls, true);
		assert.deepStrictEqual(await terminal.screen(), [
			"Server: example.test",
			"  Name: alice",
			"  Port: 8080",
			"   TLS: yes",
		]);
		assert.strictEqual(terminal.starts, 3);
		assert.strictEqual(terminal.stops, 3);
	});

	it("should run list fields", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("\x1b[B", "\r");
		terminal.sendInput(" ", "\x1b[B", "\x1b[B", " ", "\r");

		let size = "";
		let extras: string[] = [];
		const result = await new Form({ terminal, theme: plainTheme })
			.select(
				"Size",
				{
					options: [
						{ label: "small", value: "s" },
						{ label: "large", value: "l" },
					],
				},
				(v) => {
					size = v;
				},
			)
			.checklist(
				"Extras",
				{
					options: [
						{ label: "milk", value: "milk" },
						{ label: "sugar", value: "sugar" },
						{ label: "ice", value: "ice" },
					],
				},
				(v) => {
					extras = v;
				},
			)
			.send();

		assert.deepStrictEqual(result, { status: "accepted", value: undefined });
		assert.strictEqual(size, "l");
		assert.deepStrictEqual(extras, ["milk", "ice"]);
		assert.deepStrictEqual(await terminal.screen(), ["  Size: large", "Extras: milk, ice"]);
	});

	it("should hand keys left unread by one field to the next", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("one\rtwo\r");

		const values: string[] = [];
		const result = await new Form({ terminal, theme: plainTheme })
			.input("First", { kind: kinds.string() }, (v) => {
				values.push(v);
			})
			.input("Second", { kind: kinds.string() }, (v) => {
				values.push(v);
			})
			.send();

		assert.deepStrictEqual(result, { status: "accepted", value: undefined });
		assert.deepStrictEqual(values, ["one", "two"]);
		assert.deepStrictEqual(await terminal.screen(), [" First: one", "Second: two"]);
	});

	it("should let later fields see the end of input", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("one\r");
		terminal.sendEnd();

		let user = "";
		const result = await new Form({ terminal, theme: plainTheme })
			.input("Name", { kind: kinds.string() }, () => {})
			.input("User", { kind: kinds.string(), default: "guest" }, (v) => {
				user = v;
			})
			.send();

		assert.deepStrictEqual(result, { status: "accepted", value: undefined });
		assert.strictEqual(user, "guest");
		assert.deepStrictEqual(await terminal.screen(), ["Name: one", "User: guest"]);
	});

	it("should stop at the first cancelled field", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("\x03");
		terminal.sendInput("8080\r");

		let port: number | undefined;
		const result = await new Form({ terminal, theme: plainTheme })
			.input("Name", { kind: kinds.string() }, () => {})
			.input("Port", { kind: kinds.integer() }, (v) => {
				port = v;
			})
			.send();

		assert.deepStrictEqual(result, { status: "cancelled" });
		assert.strictEqual(port, undefined);
		assert.strictEqual(terminal.starts, 1);
		assert.strictEqual(terminal.interrupts, 1);
		assert.deepStrictEqual(await terminal.screen(), ["Name: ^C"]);
	});

	it("should stop at the first escaped field", async () => {
		const terminal = new VirtualTerminal(40, 10);
		terminal.sendInput("\x1b");

		const result = await new Form({ terminal, theme: plainTheme })
			.confirm("Sure", {}, () => {})
			.input("Name", { kind: kinds.string() }, () => {})
			.send();

		assert.deepStrictEqual(result, { status: "escaped" });
		assert.strictEqual(terminal.starts, 1);
		assert.strictEqual(terminal.interrupts, 0);
	});
});
