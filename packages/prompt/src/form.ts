import { columns } from "./ansi.js";
import { type ChecklistFields, checklist } from "./components/checklist.js";
import { type ConfirmFields, confirm } from "./components/confirm.js";
import { type InputFields, input } from "./components/input.js";
import { type SelectFields, select } from "./components/select.js";
import type { PromptOptions, PromptResult } from "./session.js";
import { ProcessTerminal, type Terminal } from "./terminal.js";

interface FormEntry {
	label: string;
	run(label: string): Promise<PromptResult<unknown>>;
}

/**
 * A sequence of prompts and plain lines with right-aligned labels.
 *
 * Nothing is shown until send(), which pads every label to the longest one
 * and runs the entries in order. Each accepted value is handed to its
 * callback; the first cancelled or escaped prompt ends the form.
 *
 * ```ts
 * let name = "";
 * let port = 0;
 * await new Form()
 *   .input("Name", { kind: kinds.string() }, (v) => { name = v; })
 *   .input("Port", { kind: kinds.integer({ bits: 16, unsigned: true }), validators: [validators.port()] }, (v) => { port = v; })
 *   .send();
 * ```
 */
export class Form {
	private entries: FormEntry[] = [];
	private readonly options: PromptOptions;
	private readonly terminal: Terminal;

	constructor(options: PromptOptions = {}) {
		this.terminal = options.terminal ?? new ProcessTerminal();
		this.options = { ...options, terminal: this.terminal };
	}

	/** A read-only line `label: value`. */
	print(label: string, value: unknown): this {
		this.entries.push({
			label,
			run: async (padded) => {
				this.terminal.write(`${padded}: ${String(value)}\r\n`);
				return { status: "accepted", value: undefined };
			},
		});
		return this;
	}

	input<T>(label: string, options: InputFields<T>, onAccept: (value: T) => void): this {
		return this.add(label, onAccept, (padded) => input<T>({ ...this.options, ...options, label: padded }));
	}

	confirm(label: string, options: ConfirmFields, onAccept: (value: boolean) => void): this {
		return this.add(label, onAccept, (padded) => confirm({ ...this.options, ...options, label: padded }));
	}

	select<T>(label: string, options: SelectFields<T>, onAccept: (value: T) => void): this {
		return this.add(label, onAccept, (padded) => select<T>({ ...this.options, ...options, label: padded }));
	}

	checklist<T>(label: string, options: ChecklistFields<T>, onAccept: (value: T[]) => void): this {
		return this.add(label, onAccept, (padded) => checklist<T>({ ...this.options, ...options, label: padded }));
	}

	/** Run every entry. Resolves with the first result that is not accepted. */
	async send(): Promise<PromptResult<undefined>> {
		const width = Math.max(0, ...this.entries.map((entry) => columns(entry.label)));
		for (const entry of this.entries) {
			const padded = " ".repeat(width - columns(entry.label)) + entry.label;
			const result = await entry.run(padded);
			if (result.status !== "accepted") return result;
		}
		return { status: "accepted", value: undefined };
	}

	private add<T>(label: string, onAccept: (value: T) => void, run: (padded: string) => Promise<PromptResult<T>>): this {
		this.entries.push({
			label,
			run: async (padded) => {
				const result = await run(padded);
				if (result.status === "accepted") onAccept(result.value);
				return result;
			},
		});
		return this;
	}
}
