import { type ListOption, OptionSet } from "../list-controller.js";
import { type PromptOptions, type PromptResult, promptContext } from "../session.js";
import { runListPrompt } from "./list-prompt.js";

export interface ChecklistFields<T> {
	options: ReadonlyArray<ListOption<T>>;
	/** Indices checked at first */
	checked?: readonly number[];
	/** Values checked at first, in addition to `checked`; unknown values are skipped */
	checkedValues?: readonly T[];
}

export interface ChecklistOptions<T> extends PromptOptions, ChecklistFields<T> {
	label: string;
}

/**
 * Pick any number of options. Space toggles the row under the cursor,
 * Enter accepts the checked options in their original order.
 */
export async function checklist<T>(options: ChecklistOptions<T>): Promise<PromptResult<T[]>> {
	const ctx = promptContext(options);
	const set = new OptionSet(options.options, ctx.config.maxOptions);

	return runListPrompt(ctx, set, {
		label: options.label,
		header: `${options.label} (space toggles)`,
		multiple: true,
		checked: [...(options.checked ?? []), ...set.indicesOfValues(options.checkedValues ?? [])],
		accept: (outcome) => {
			const indices = outcome.type === "checked" ? outcome.indices : [];
			const items = indices.flatMap((i) => {
				const item = set.items[i];
				return item ? [item] : [];
			});
			return {
				summary: items.map((item) => item.label).join(", "),
				value: items.map((item) => item.value),
			};
		},
	});
}
