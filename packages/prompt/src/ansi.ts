/**
 * Escape-sequence primitives shared by the prompts and progress indicators.
 * All counts are in cells; a zero count yields an empty string so callers
 * can concatenate unconditionally.
 */

export const ESC = "\x1b";
export const CSI = `${ESC}[`;

export const clearLine = `${CSI}2K`;
export const hideCursor = `${CSI}?25l`;
export const showCursor = `${CSI}?25h`;

export function cursorUp(n = 1): string {
	return n > 0 ? `${CSI}${n}A` : "";
}

export function cursorDown(n = 1): string {
	return n > 0 ? `${CSI}${n}B` : "";
}

export function cursorRight(n = 1): string {
	return n > 0 ? `${CSI}${n}C` : "";
}

export function cursorLeft(n = 1): string {
	return n > 0 ? `${CSI}${n}D` : "";
}

/** Move vertically by a signed amount: negative is up. */
export function cursorMoveRows(delta: number): string {
	return delta < 0 ? cursorUp(-delta) : cursorDown(delta);
}

/** Move horizontally by a signed amount: negative is left. */
export function cursorMoveColumns(delta: number): string {
	return delta < 0 ? cursorLeft(-delta) : cursorRight(delta);
}

/** Absolute column, 0-based. */
export function cursorColumn(column: number): string {
	return `${CSI}${column + 1}G`;
}

/** Number of terminal columns a plain string occupies (one code point per column). */
export function columns(text: string): number {
	let n = 0;
	for (const _ of text) n++;
	return n;
}

/** Cut plain text to at most `width` code points. */
export function truncate(text: string, width: number): string {
	if (width <= 0) return "";
	const points = Array.from(text);
	return points.length <= width ? text : points.slice(0, width).join("");
}
