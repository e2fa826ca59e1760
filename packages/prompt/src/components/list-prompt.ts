import { columns, truncate } from "../ansi.js";
import { FittedLine } from "../line-editor.js";
import {
	ListController,
	type ListOutcome,
	type OptionSet,
	listCapacity,
	searchEnabled,
} from "../list-controller.js";
import { Renderer } from "../renderer.js";
import { type PromptContext, type PromptResult, runSession } from "../session.js";

export const NO_OPTIONS_PLACEHOLDER = "  no options found";

export type AcceptedOutcome = Extract<ListOutcome, { type: "selected" | "checked" }>;

export interface ListPromptSettings<R> {
	label: string;
	/** Text before the query, defaults to the label */
	header?: string;
	multiple: boolean;
	selected?: number;
	checked?: readonly number[];
	accept(outcome: AcceptedOutcome): { summary: string; value: R };
}

/**
 * Drive a ListController against the terminal. Terminal geometry is read
 * once; the window size does not follow later resizes.
 */
export async function runListPrompt<T, R>(
	ctx: PromptContext,
	set: OptionSet<T>,
	settings: ListPromptSettings<R>,
): Promise<PromptResult<R>> {
	const { terminal, theme, config, keybindings } = ctx;
	const capacity = listCapacity(config, terminal.rows, set.size);
	const search = searchEnabled(capacity, set.size, config.searchThreshold);
	const list = new ListController(set, {
		keybindings,
		capacity,
		scrollMargin: config.scrollMargin,
		wrap: config.wrap,
		search,
		multiple: settings.multiple,
		selected: settings.selected,
		checked: settings.checked,
	});

	const width = Math.max(1, terminal.columns - 1);
	const header = `${settings.header ?? settings.label}:`;
	const renderer = new Renderer(terminal);

	const field = new FittedLine(`${header} `, terminal.columns);
	const title = truncate(header, width);

	const queryView = () => field.view(list.queryText, list.queryCursor);
	const labelLine = (): string => (search ? field.line(queryView()) : title);
	const column = (): number => (search ? field.column(queryView()) : columns(title));

	const formatRow = (position: number): string => {
		const row = list.row(position);
		const marker = row.cursor ? "> " : "  ";
		const text = settings.multiple ? `${marker}[${row.checked ? "×" : " "}] ${row.label}` : marker + row.label;
		const clipped = truncate(text, width);
		return row.cursor ? theme.selected(clipped) : clipped;
	};

	const lines = (): string[] => {
		if (list.filteredIndex.length === 0) return [labelLine(), truncate(NO_OPTIONS_PLACEHOLDER, width)];
		const out = [labelLine()];
		for (let p = list.start; p < list.start + list.visibleCount; p++) {
			out.push(formatRow(p));
		}
		return out;
	};

	return runSession<R>(terminal, { hideCursor: !search }, async (keys) => {
		renderer.repaint(lines(), 0, column(), "open");
		for (;;) {
			const event = await keys.readKey();
			const before = queryView();
			const step = list.handleKey(event);
			const outcome = step.outcome;
			if (outcome) {
				switch (outcome.type) {
					case "cancelled":
						renderer.close(`${settings.label}: ^C`);
						return { status: "cancelled" };
					case "escaped":
						renderer.close(`${settings.label}: `);
						return { status: "escaped" };
					default: {
						const { summary, value } = settings.accept(outcome);
						renderer.close(`${settings.label}: ${summary}`);
						return { status: "accepted", value };
					}
				}
			}

			const redraw = step.redraw;
			const query = step.query ? field.patch(before, queryView()) : undefined;
			if (redraw.type === "full" || (step.query && !query)) {
				renderer.repaint(lines(), 0, column(), redraw.type === "full" ? "list window changed" : "query scrolled");
				continue;
			}
			if (redraw.type === "rows") {
				renderer.paintRows(redraw.positions.map((p) => [1 + p - list.start, formatRow(p)] as const));
			}
			if (query) renderer.patch(query);
		}
	});
}
