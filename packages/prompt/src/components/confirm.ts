import { columns, truncate } from "../ansi.js";
import { kinds, parseBoolean, type ValueKind } from "../coerce.js";
import { printable } from "../keys.js";
import { Renderer } from "../renderer.js";
import { type PromptContext, type PromptOptions, type PromptResult, promptContext, runSession } from "../session.js";
import { type Validator, validate } from "../validators.js";

export interface ConfirmFields {
	/** Answer taken on Enter; defaults to no */
	default?: boolean;
	validators?: ReadonlyArray<Validator<boolean>>;
}

export interface ConfirmOptions extends PromptOptions, ConfirmFields {
	label: string;
}

export interface EnterOptions extends PromptOptions {
	label: string;
}

/**
 * Two-outcome entry for kinds with a yes and a no value. A single key
 * answers (y/t/1 or n/f/0, any case); Enter takes the default.
 */
export async function runChoice<T>(
	ctx: PromptContext,
	label: string,
	kind: ValueKind<T>,
	choice: { readonly yes: T; readonly no: T },
	defaultValue: T,
	validators: ReadonlyArray<Validator<T>>,
): Promise<PromptResult<T>> {
	const { terminal, theme, keybindings: kb } = ctx;
	const hint = Object.is(defaultValue, choice.yes) ? "[Y/n]" : "[y/N]";
	const line = truncate(`${label} ${hint}: `, terminal.columns - 1);
	const renderer = new Renderer(terminal);

	return runSession<T>(terminal, {}, async (keys) => {
		renderer.repaint([line], 0, columns(line), "open");
		for (;;) {
			const event = await keys.readKey();
			if (kb.matches(event, "interrupt")) {
				renderer.close(`${label}: ^C`);
				return { status: "cancelled" };
			}
			if (kb.matches(event, "cancel")) {
				renderer.close(`${label}: `);
				return { status: "escaped" };
			}

			let value: T;
			if (kb.matches(event, "submit")) {
				value = defaultValue;
			} else {
				const answer = parseBoolean(printable(event) ?? "");
				if (answer === undefined) continue;
				value = answer ? choice.yes : choice.no;
			}

			const reason = validate(value, validators);
			if (reason !== undefined) {
				const error = theme.error(truncate(`ERROR: ${reason}`, terminal.columns - 1));
				renderer.repaint([error, line], 1, columns(line), "validation error");
				continue;
			}
			renderer.close(`${label}: ${kind.format(value)}`);
			return { status: "accepted", value };
		}
	});
}

/** Yes/no question answered with a single key. */
export async function confirm(options: ConfirmOptions): Promise<PromptResult<boolean>> {
	const ctx = promptContext(options);
	const kind = kinds.boolean();
	return runChoice(ctx, options.label, kind, { yes: true, no: false }, options.default ?? false, options.validators ?? []);
}

/** Wait for Enter. */
export async function enter(options: EnterOptions): Promise<PromptResult<undefined>> {
	const { terminal, keybindings: kb } = promptContext(options);
	const line = `${options.label} [enter]: `;
	const shown = truncate(line, terminal.columns - 1);
	const renderer = new Renderer(terminal);

	return runSession(terminal, {}, async (keys) => {
		renderer.repaint([shown], 0, columns(shown), "open");
		for (;;) {
			const event = await keys.readKey();
			if (kb.matches(event, "interrupt")) {
				renderer.close(`${line}^C`);
				return { status: "cancelled" };
			}
			if (kb.matches(event, "cancel")) {
				renderer.close(line);
				return { status: "escaped" };
			}
			if (kb.matches(event, "submit")) {
				renderer.close(line);
				return { status: "accepted", value: undefined };
			}
		}
	});
}
