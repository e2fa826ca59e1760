import { clearLine, columns, cursorColumn, cursorLeft, cursorMoveColumns, cursorMoveRows, cursorUp } from "./ansi.js";
import { logRedraw } from "./debug.js";
import { isEmptyPatch, type LinePatch } from "./line-editor.js";
import type { Terminal } from "./terminal.js";

/**
 * Draws a prompt into a block of working rows starting at the line the cursor
 * is on when the prompt opens.
 *
 * Rows are addressed relative to the top of the block. After every call the
 * cursor rests on the anchor row at the logical column, ready for the next
 * key. Each call emits its output in a single write.
 */
export class Renderer {
	// Rows owned by the prompt; the first one is the line the prompt started on
	private height = 1;
	private row = 0;
	private anchor = 0;
	private column = 0;
	private closed = false;

	/** Number of repaints of the whole block */
	fullRedraws = 0;
	/** Number of row or line-patch updates */
	partialRedraws = 0;

	constructor(private readonly terminal: Terminal) {}

	get anchorRow(): number {
		return this.anchor;
	}

	get cursorColumn(): number {
		return this.column;
	}

	get rowCount(): number {
		return this.height;
	}

	/**
	 * Repaint every row. Rows beyond `lines` that were drawn before are
	 * blanked but stay part of the block.
	 */
	repaint(lines: readonly string[], anchor: number, column: number, reason = "repaint"): void {
		if (this.closed) return;
		this.fullRedraws++;
		logRedraw(`${reason} (rows=${lines.length}, height=${this.height})`);

		let out = "";
		lines.forEach((line, i) => {
			if (i < this.height) {
				out += this.moveTo(i);
			} else {
				out += `${this.moveTo(this.height - 1)}\r\n`;
				this.height++;
				this.row = i;
			}
			out += cursorColumn(0) + clearLine + line;
		});
		for (let i = lines.length; i < this.height; i++) {
			out += this.moveTo(i) + cursorColumn(0) + clearLine;
		}

		this.anchor = Math.min(anchor, this.height - 1);
		this.column = column;
		out += this.moveTo(this.anchor) + cursorColumn(this.column);
		this.terminal.write(out);
	}

	/** Rewrite single rows in place, then return to the anchor. */
	paintRows(rows: ReadonlyArray<readonly [row: number, text: string]>): void {
		if (this.closed || rows.length === 0) return;
		this.partialRedraws++;

		let out = "";
		for (const [row, text] of rows) {
			if (row < 0 || row >= this.height) continue;
			out += this.moveTo(row) + cursorColumn(0) + clearLine + text;
		}
		out += this.moveTo(this.anchor) + cursorColumn(this.column);
		this.terminal.write(out);
	}

	/** Apply a line-editor patch on the anchor row. */
	patch(patch: LinePatch): void {
		if (this.closed) return;
		if (isEmptyPatch(patch)) return;
		this.partialRedraws++;

		const out = cursorMoveColumns(patch.shift) + patch.text + " ".repeat(patch.erase) + cursorLeft(patch.back);
		this.column = Math.max(0, this.column + patch.shift + columns(patch.text) + patch.erase - patch.back);
		this.terminal.write(out);
	}

	/**
	 * Erase all working rows from the bottom up, rest on the top row and
	 * write the one-line result. Later calls are ignored.
	 */
	close(summary: string): void {
		if (this.closed) return;
		this.closed = true;

		let out = this.moveTo(this.height - 1);
		for (let i = this.height - 1; i >= 0; i--) {
			out += cursorColumn(0) + clearLine;
			if (i > 0) out += cursorUp(1);
		}
		this.row = 0;
		out += `${summary}\r\n`;
		this.terminal.write(out);
	}

	private moveTo(row: number): string {
		const out = cursorMoveRows(row - this.row);
		this.row = row;
		return out;
	}
}
