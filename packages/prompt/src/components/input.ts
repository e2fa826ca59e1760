import { truncate } from "../ansi.js";
import type { ValueKind } from "../coerce.js";
import { FittedLine, LineEditor } from "../line-editor.js";
import { Renderer } from "../renderer.js";
import { type PromptOptions, type PromptResult, promptContext, runSession } from "../session.js";
import { type Validator, validate } from "../validators.js";
import { runChoice } from "./confirm.js";

/** What a text field reads, independent of where it is shown. */
export interface InputFields<T> {
	kind: ValueKind<T>;
	/** Pre-filled value, editable */
	default?: T;
	/** Initial cursor position in the pre-filled text; defaults to its end */
	cursor?: number;
	validators?: ReadonlyArray<Validator<T>>;
}

export interface InputOptions<T> extends PromptOptions, InputFields<T> {
	label: string;
}

type InputMode = { type: "editing" } | { type: "reportingError"; reason: string };

/**
 * Single-line text entry with in-place editing.
 *
 * Enter coerces the text into the declared kind and runs the validators.
 * A rejection shows `ERROR: <reason>` on the row above the input line and
 * keeps the text for editing; acceptance erases both rows and leaves a
 * one-line summary.
 */
export async function input<T>(options: InputOptions<T>): Promise<PromptResult<T>> {
	const ctx = promptContext(options);
	const { label, kind } = options;
	const validators = options.validators ?? [];

	if (kind.choice) {
		return runChoice(ctx, label, kind, kind.choice, options.default ?? kind.choice.no, validators);
	}

	const { terminal, theme, keybindings: kb } = ctx;
	const initial = options.default === undefined ? "" : kind.format(options.default);
	const editor = new LineEditor(kb, initial, options.cursor);
	const renderer = new Renderer(terminal);
	const prefix = `${label}: `;
	const field = new FittedLine(prefix, terminal.columns);
	let mode: InputMode = { type: "editing" };

	const view = () => field.view(editor.value, editor.text.cursor);
	const lines = (): string[] => {
		const line = field.line(view());
		if (mode.type === "editing") return [line];
		return [theme.error(truncate(`ERROR: ${mode.reason}`, terminal.columns - 1)), line];
	};
	const column = (): number => field.column(view());

	const check = (text: string): { ok: true; value: T } | { ok: false; reason: string } => {
		const coerced = kind.coerce(text);
		if (!coerced.ok) return coerced;
		const reason = validate(coerced.value, validators);
		return reason === undefined ? coerced : { ok: false, reason };
	};

	return runSession<T>(terminal, {}, async (keys) => {
		renderer.repaint(lines(), 0, column(), "open");
		for (;;) {
			const event = await keys.readKey();
			if (kb.matches(event, "interrupt")) {
				renderer.close(`${prefix}^C`);
				return { status: "cancelled" };
			}
			if (kb.matches(event, "cancel")) {
				renderer.close(prefix);
				return { status: "escaped" };
			}
			if (kb.matches(event, "submit")) {
				const result = check(editor.value);
				if (result.ok) {
					renderer.close(prefix + editor.value);
					return { status: "accepted", value: result.value };
				}
				mode = { type: "reportingError", reason: result.reason };
				const current = lines();
				renderer.repaint(current, current.length - 1, column(), "validation error");
				continue;
			}

			const before = view();
			if (!editor.handleKey(event)) continue;
			const patch = field.patch(before, view());
			if (patch) {
				renderer.patch(patch);
			} else {
				const current = lines();
				renderer.repaint(current, current.length - 1, column(), "line scrolled");
			}
		}
	});
}
