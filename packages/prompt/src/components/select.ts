import { type ListOption, OptionSet } from "../list-controller.js";
import { type PromptOptions, type PromptResult, promptContext } from "../session.js";
import { runListPrompt } from "./list-prompt.js";

export interface SelectFields<T> {
	options: ReadonlyArray<ListOption<T>>;
	/** Index of the option selected at first; clipped into range */
	selected?: number;
	/**
	 * Value of the option selected at first, used when `selected` is not
	 * given. A value no option carries selects the first option.
	 */
	selectedValue?: T;
}

export interface SelectOptions<T> extends PromptOptions, SelectFields<T> {
	label: string;
}

function initialIndex<T>(set: OptionSet<T>, options: SelectFields<T>): number | undefined {
	if (options.selectedValue === undefined) return undefined;
	return Math.max(0, set.indexOfValue(options.selectedValue));
}

/**
 * Pick one option. Up/Down (also Tab/Shift+Tab, and k/w j/s without a
 * search field) move, PageUp/PageDown jump a window, Home/End go to the
 * ends, Enter accepts. Lists larger than the window or the search threshold
 * get a search field; typing filters by case-insensitive substring.
 */
export async function select<T>(options: SelectOptions<T>): Promise<PromptResult<T>> {
	const ctx = promptContext(options);
	const set = new OptionSet(options.options, ctx.config.maxOptions);

	return runListPrompt(ctx, set, {
		label: options.label,
		multiple: false,
		selected: options.selected ?? initialIndex(set, options),
		accept: (outcome) => {
			const index = outcome.type === "selected" ? outcome.index : -1;
			const item = set.items[index];
			if (!item) throw new Error(`no option at index ${index}`);
			return { summary: item.label, value: item.value };
		},
	});
}
