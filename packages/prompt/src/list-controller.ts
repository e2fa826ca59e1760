import type { PromptConfig, WrapPolicy } from "./config.js";
import { PromptConfigError } from "./errors.js";
import type { Keybindings } from "./keybindings.js";
import type { KeyEvent } from "./keys.js";
import { isEmptyPatch, LineEditor, type LinePatch } from "./line-editor.js";

export interface ListOption<T> {
	label: string;
	value: T;
}

/**
 * Immutable, non-empty, bounded list of options.
 */
export class OptionSet<T> {
	readonly items: ReadonlyArray<Readonly<ListOption<T>>>;

	constructor(items: ReadonlyArray<ListOption<T>>, maxOptions: number) {
		if (items.length === 0) {
			throw new PromptConfigError("no options");
		}
		if (items.length > maxOptions) {
			throw new PromptConfigError("too many options");
		}
		this.items = Object.freeze(items.map((item) => Object.freeze({ ...item })));
	}

	get size(): number {
		return this.items.length;
	}

	label(index: number): string {
		return this.items[index]?.label ?? "";
	}

	/** Position of the first option whose value is `value`, or -1. */
	indexOfValue(value: T): number {
		return this.items.findIndex((item) => Object.is(item.value, value));
	}

	/** Positions of the options whose values are listed; unknown values are skipped. */
	indicesOfValues(values: readonly T[]): number[] {
		return values.map((value) => this.indexOfValue(value)).filter((index) => index >= 0);
	}
}

/** Rows available for options: one terminal row is kept for the label line. */
export function listCapacity(config: Pick<PromptConfig, "maxVisible">, terminalRows: number, optionCount: number): number {
	return Math.max(1, Math.min(config.maxVisible, terminalRows - 1, optionCount));
}

export function searchEnabled(capacity: number, optionCount: number, searchThreshold: number): boolean {
	return capacity < optionCount || optionCount > searchThreshold;
}

export type ListState = "normal" | "searching" | "empty" | "accepted" | "cancelled" | "escaped";

export type ListOutcome =
	| { type: "selected"; index: number }
	| { type: "checked"; indices: number[] }
	| { type: "cancelled" }
	| { type: "escaped" };

export type ListRedraw =
	| { type: "none" }
	| { type: "full" }
	/** Filtered positions whose rows changed */
	| { type: "rows"; positions: number[] };

export interface ListStep {
	redraw: ListRedraw;
	/** Cursor-only change of the query line */
	query?: LinePatch;
	outcome?: ListOutcome;
}

export interface ListControllerOptions {
	keybindings: Keybindings;
	/** Maximum visible rows, fixed for the lifetime of the list. */
	capacity: number;
	scrollMargin: number;
	wrap: WrapPolicy;
	search: boolean;
	/** Checklist mode: the toggle key flips rows, only Enter ends. */
	multiple?: boolean;
	/** Original index of the initially selected option (clipped). */
	selected?: number;
	/** Original indices that start out checked. */
	checked?: readonly number[];
}

export interface ListRow {
	/** Index into the option set */
	index: number;
	label: string;
	cursor: boolean;
	checked: boolean;
}

const NONE: ListStep = { redraw: { type: "none" } };

function clip(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

/**
 * Selection, window and search state of one list prompt.
 *
 * Invariants while the filtered list is non-empty:
 * 0 <= start <= count - visible and start <= selection < start + visible.
 */
export class ListController<T> {
	private filtered: number[];
	private _selection: number;
	private _start = 0;
	private readonly query?: LineEditor;
	private readonly checkedFlags: boolean[];
	private outcome?: ListOutcome;

	constructor(
		readonly options: OptionSet<T>,
		private readonly settings: ListControllerOptions,
	) {
		this.filtered = options.items.map((_, i) => i);
		this._selection = clip(settings.selected ?? 0, 0, options.size - 1);
		this.checkedFlags = options.items.map(() => false);
		for (const index of settings.checked ?? []) {
			if (index >= 0 && index < options.size) this.checkedFlags[index] = true;
		}
		if (settings.search) {
			this.query = new LineEditor(settings.keybindings);
		}
		this.resetWindow();
	}

	get state(): ListState {
		const outcome = this.outcome;
		if (outcome) {
			return outcome.type === "selected" || outcome.type === "checked" ? "accepted" : outcome.type;
		}
		if (this.filtered.length === 0) return "empty";
		if (this.query && this.query.value !== "") return "searching";
		return "normal";
	}

	get searchEnabled(): boolean {
		return this.query !== undefined;
	}

	get queryText(): string {
		return this.query?.value ?? "";
	}

	get queryCursor(): number {
		return this.query?.text.cursor ?? 0;
	}

	/** Original indices of the options matching the query, in order */
	get filteredIndex(): readonly number[] {
		return this.filtered;
	}

	get selection(): number {
		return this._selection;
	}

	/** Original index under the cursor, if any option matches */
	get selectedIndex(): number | undefined {
		return this.filtered[this._selection];
	}

	get start(): number {
		return this._start;
	}

	get visibleCount(): number {
		return Math.min(this.settings.capacity, this.filtered.length);
	}

	get margin(): number {
		return Math.max(0, Math.min(this.settings.scrollMargin, Math.floor((this.visibleCount - 1) / 2)));
	}

	/** Original indices currently shown, top to bottom */
	get visibleIndices(): number[] {
		return this.filtered.slice(this._start, this._start + this.visibleCount);
	}

	get checkedIndices(): number[] {
		const out: number[] = [];
		this.checkedFlags.forEach((checked, i) => {
			if (checked) out.push(i);
		});
		return out;
	}

	isChecked(index: number): boolean {
		return this.checkedFlags[index] ?? false;
	}

	/** Row data for a filtered position. */
	row(position: number): ListRow {
		const index = this.filtered[position] ?? -1;
		return {
			index,
			label: this.options.label(index),
			cursor: position === this._selection,
			checked: this.isChecked(index),
		};
	}

	/**
	 * Rebuild the filtered index from the current query, keep the selected
	 * option if it still matches and recenter the window.
	 */
	refilter(): void {
		const previous = this.filtered[this._selection];
		const needle = this.queryText.toLowerCase();
		this.filtered = [];
		this.options.items.forEach((item, i) => {
			if (needle === "" || item.label.toLowerCase().includes(needle)) {
				this.filtered.push(i);
			}
		});
		const relocated = previous === undefined ? -1 : this.filtered.indexOf(previous);
		this._selection = relocated >= 0 ? relocated : 0;
		this.resetWindow();
	}

	handleKey(event: KeyEvent): ListStep {
		if (this.outcome) return NONE;
		const kb = this.settings.keybindings;

		if (kb.matches(event, "interrupt")) {
			return this.finish({ type: "cancelled" });
		}
		if (kb.matches(event, "cancel")) {
			return this.finish({ type: "escaped" });
		}

		if (this.settings.multiple && kb.matches(event, "toggle")) {
			const index = this.filtered[this._selection];
			if (index === undefined) return NONE;
			this.checkedFlags[index] = !this.checkedFlags[index];
			return { redraw: { type: "rows", positions: [this._selection] } };
		}

		if (kb.matches(event, "selectConfirm")) {
			if (this.settings.multiple) {
				return this.finish({ type: "checked", indices: this.checkedIndices });
			}
			const index = this.filtered[this._selection];
			if (index === undefined) return NONE;
			return this.finish({ type: "selected", index });
		}

		const count = this.filtered.length;
		const last = count - 1;
		const altKeys = !this.query;
		if (kb.matches(event, "selectUp") || (altKeys && kb.matches(event, "selectUpAlt"))) {
			if (this._selection === 0 && this.settings.wrap === "wrap") return this.moveTo(last);
			return this.moveTo(this._selection - 1);
		}
		if (kb.matches(event, "selectDown") || (altKeys && kb.matches(event, "selectDownAlt"))) {
			if (this._selection === last && this.settings.wrap === "wrap") return this.moveTo(0);
			return this.moveTo(this._selection + 1);
		}
		if (kb.matches(event, "selectPageUp")) {
			return this.moveTo(this._selection - this.visibleCount);
		}
		if (kb.matches(event, "selectPageDown")) {
			return this.moveTo(this._selection + this.visibleCount);
		}
		if (kb.matches(event, "selectFirst")) {
			return this.moveTo(0);
		}
		if (kb.matches(event, "selectLast")) {
			return this.moveTo(last);
		}

		if (this.query) {
			const before = this.query.value;
			const patch = this.query.handleKey(event);
			if (patch === undefined) return NONE;
			if (this.query.value === before) {
				return isEmptyPatch(patch) ? NONE : { redraw: { type: "none" }, query: patch };
			}
			this.refilter();
			return { redraw: { type: "full" } };
		}

		return NONE;
	}

	/** Move the cursor to a filtered position, scrolling with margin hysteresis. */
	private moveTo(target: number): ListStep {
		const count = this.filtered.length;
		if (count === 0) return NONE;
		const next = clip(target, 0, count - 1);
		const previous = this._selection;
		if (next === previous) return NONE;

		const visible = this.visibleCount;
		const margin = this.margin;
		const start = this._start;
		let nextStart = start;
		if (next < previous) {
			if (next < start + margin) nextStart = Math.max(0, next - margin);
		} else if (next > start + visible - 1 - margin) {
			nextStart = Math.min(next + margin + 1 - visible, count - visible);
		}

		this._selection = next;
		this._start = nextStart;
		if (nextStart === start) {
			return { redraw: { type: "rows", positions: [previous, next] } };
		}
		return { redraw: { type: "full" } };
	}

	private resetWindow(): void {
		const count = this.filtered.length;
		const visible = this.visibleCount;
		if (visible === 0) {
			this._start = 0;
			return;
		}
		this._start = clip(this._selection - Math.floor((visible - 1) / 2), 0, count - visible);
	}

	private finish(outcome: ListOutcome): ListStep {
		this.outcome = outcome;
		return { redraw: { type: "none" }, outcome };
	}
}
