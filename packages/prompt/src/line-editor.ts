import { columns, truncate } from "./ansi.js";
import type { Keybindings } from "./keybindings.js";
import { type KeyEvent, printable } from "./keys.js";

/**
 * Minimal redraw for a single edited line, relative to the cursor.
 *
 * Apply by moving `shift` columns (negative is left), writing `text`,
 * writing `erase` blanks, then moving `back` columns left. The cursor then
 * sits on the new logical position.
 */
export interface LinePatch {
	shift: number;
	text: string;
	erase: number;
	back: number;
}

export const EMPTY_PATCH: LinePatch = { shift: 0, text: "", erase: 0, back: 0 };

export function isEmptyPatch(patch: LinePatch): boolean {
	return patch.shift === 0 && patch.text === "" && patch.erase === 0 && patch.back === 0;
}

function clip(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

/**
 * Patch that turns `before` (cursor `from`) into `after` (cursor `to`),
 * rewriting only the suffix that starts at the first differing code point.
 */
export function diffLine(before: readonly string[], from: number, after: readonly string[], to: number): LinePatch {
	let common = 0;
	const limit = Math.min(before.length, after.length);
	while (common < limit && before[common] === after[common]) common++;

	if (common === before.length && common === after.length) {
		return { shift: to - from, text: "", erase: 0, back: 0 };
	}

	const text = after.slice(common).join("");
	const erase = Math.max(0, before.length - after.length);
	// after writing, the cursor sits at after.length + erase
	return { shift: common - from, text, erase, back: after.length + erase - to };
}

/** The visible part of a scrolled line; `cursor` is relative to `start`. */
export interface LineWindow {
	start: number;
	points: string[];
	cursor: number;
}

/**
 * At most `width` code points around the cursor. Text that fits is shown
 * whole; otherwise the window keeps the cursor near its middle, or against
 * the nearer end of the text.
 */
export function scrollWindow(points: readonly string[], cursor: number, width: number): LineWindow {
	if (points.length <= width) return { start: 0, points: [...points], cursor };

	const half = Math.floor(width / 2);
	let start: number;
	if (cursor < half) {
		start = 0;
	} else if (cursor > points.length - half) {
		start = points.length - width;
	} else {
		start = cursor - half;
	}
	return { start, points: points.slice(start, start + width), cursor: cursor - start };
}

/**
 * A fixed prefix followed by edited text, kept on a single terminal row.
 * The last column stays free so a cursor at the end never wraps.
 */
export class FittedLine {
	readonly prefix: string;
	private readonly width: number;

	constructor(prefix: string, terminalColumns: number) {
		this.prefix = truncate(prefix, terminalColumns - 2);
		this.width = Math.max(1, terminalColumns - 1 - columns(this.prefix));
	}

	view(text: string, cursor: number): LineWindow {
		return scrollWindow(Array.from(text), cursor, this.width);
	}

	line(view: LineWindow): string {
		return this.prefix + view.points.join("");
	}

	column(view: LineWindow): number {
		return columns(this.prefix) + view.cursor;
	}

	/** Patch between two views, or undefined if the window moved and the row needs a repaint. */
	patch(before: LineWindow, after: LineWindow): LinePatch | undefined {
		if (before.start !== after.start) return undefined;
		return diffLine(before.points, before.cursor, after.points, after.cursor);
	}
}

/**
 * Editable code-point buffer with a cursor. 0 <= cursor <= length always.
 */
export class EditableText {
	private points: string[];
	private _cursor: number;

	constructor(initial = "", cursor?: number) {
		this.points = Array.from(initial);
		this._cursor = clip(cursor ?? this.points.length, 0, this.points.length);
	}

	get value(): string {
		return this.points.join("");
	}

	get length(): number {
		return this.points.length;
	}

	get cursor(): number {
		return this._cursor;
	}

	insert(text: string): LinePatch {
		const add = Array.from(text);
		if (add.length === 0) return EMPTY_PATCH;
		const next = [...this.points.slice(0, this._cursor), ...add, ...this.points.slice(this._cursor)];
		return this.apply(next, this._cursor + add.length);
	}

	deleteBefore(): LinePatch {
		if (this._cursor === 0) return EMPTY_PATCH;
		const next = [...this.points.slice(0, this._cursor - 1), ...this.points.slice(this._cursor)];
		return this.apply(next, this._cursor - 1);
	}

	deleteAt(): LinePatch {
		if (this._cursor === this.points.length) return EMPTY_PATCH;
		const next = [...this.points.slice(0, this._cursor), ...this.points.slice(this._cursor + 1)];
		return this.apply(next, this._cursor);
	}

	deleteToStart(): LinePatch {
		if (this._cursor === 0) return EMPTY_PATCH;
		return this.apply(this.points.slice(this._cursor), 0);
	}

	deleteToEnd(): LinePatch {
		if (this._cursor === this.points.length) return EMPTY_PATCH;
		return this.apply(this.points.slice(0, this._cursor), this._cursor);
	}

	moveBy(delta: number): LinePatch {
		return this.moveTo(this._cursor + delta);
	}

	moveTo(position: number): LinePatch {
		const target = clip(position, 0, this.points.length);
		if (target === this._cursor) return EMPTY_PATCH;
		return this.apply(this.points, target);
	}

	private apply(next: string[], cursor: number): LinePatch {
		const patch = diffLine(this.points, this._cursor, next, cursor);
		this.points = next;
		this._cursor = cursor;
		return patch;
	}
}

/**
 * Key handling on top of EditableText. Returns undefined for keys that are
 * not editing keys so the caller can handle them.
 */
export class LineEditor {
	readonly text: EditableText;

	constructor(
		private readonly keybindings: Keybindings,
		initial = "",
		cursor?: number,
	) {
		this.text = new EditableText(initial, cursor);
	}

	get value(): string {
		return this.text.value;
	}

	handleKey(event: KeyEvent): LinePatch | undefined {
		const kb = this.keybindings;
		if (kb.matches(event, "deleteCharBackward")) return this.text.deleteBefore();
		if (kb.matches(event, "deleteCharForward")) return this.text.deleteAt();
		if (kb.matches(event, "deleteToLineStart")) return this.text.deleteToStart();
		if (kb.matches(event, "deleteToLineEnd")) return this.text.deleteToEnd();
		if (kb.matches(event, "cursorLeft")) return this.text.moveBy(-1);
		if (kb.matches(event, "cursorRight")) return this.text.moveBy(1);
		if (kb.matches(event, "cursorLineStart")) return this.text.moveTo(0);
		if (kb.matches(event, "cursorLineEnd")) return this.text.moveTo(this.text.length);

		const ch = printable(event);
		if (ch !== undefined) return this.text.insert(ch);
		return undefined;
	}
}
