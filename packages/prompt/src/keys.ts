/**
 * Keyboard decoding for raw-mode terminal input.
 *
 * Turns the code-point stream of an InputQueue into logical key events:
 * printable characters, control keys, arrows, Home/End/Delete/PageUp/PageDown,
 * Escape, Enter, interrupt (Ctrl+C) and end-of-input (Ctrl+D or EOF).
 *
 * Escape sequences are read only as far as the input that arrived with the ESC
 * allows. A sequence cut short resolves to what its prefix already means
 * instead of blocking for more input.
 */

import { InputEndedError } from "./errors.js";
import type { InputQueue } from "./input-queue.js";

// =============================================================================
// Key identifiers
// =============================================================================

type Letter =
	| "a"
	| "b"
	| "c"
	| "d"
	| "e"
	| "f"
	| "g"
	| "h"
	| "i"
	| "j"
	| "k"
	| "l"
	| "m"
	| "n"
	| "o"
	| "p"
	| "q"
	| "r"
	| "s"
	| "t"
	| "u"
	| "v"
	| "w"
	| "x"
	| "y"
	| "z";

type Digit = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

export type SpecialKey =
	| "escape"
	| "enter"
	| "tab"
	| "shift+tab"
	| "backspace"
	| "delete"
	| "insert"
	| "home"
	| "end"
	| "pageUp"
	| "pageDown"
	| "up"
	| "down"
	| "left"
	| "right"
	| "interrupt"
	| "eof";

/**
 * Names usable in keybindings. Printable keys are bound by their character;
 * the space bar is "space".
 */
export type KeyId = SpecialKey | `ctrl+${Letter}` | Letter | Uppercase<Letter> | Digit | "space";

export type KeyEvent =
	| { type: "char"; char: string }
	| { type: "key"; key: SpecialKey }
	| { type: "ctrl"; letter: string }
	| { type: "unknown"; sequence: string };

// =============================================================================
// Sequence tables
// =============================================================================

const CSI_LETTER_KEYS: Record<string, SpecialKey> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
	Z: "shift+tab",
};

const SS3_KEYS: Record<string, SpecialKey> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
	M: "enter",
};

// ESC [ <n> ~
const CSI_TILDE_KEYS: Record<string, SpecialKey> = {
	"1": "home",
	"2": "insert",
	"3": "delete",
	"4": "end",
	"5": "pageUp",
	"6": "pageDown",
	"7": "home",
	"8": "end",
};

const ESC = "\x1b";

function key(name: SpecialKey): KeyEvent {
	return { type: "key", key: name };
}

function isCsiParameter(ch: string): boolean {
	const code = ch.charCodeAt(0);
	// parameter bytes 0x30-0x3F and intermediate bytes 0x20-0x2F
	return code >= 0x20 && code <= 0x3f;
}

/**
 * Decode a single code point that is not ESC.
 */
export function decodeCodePoint(ch: string): KeyEvent {
	switch (ch) {
		case "\x03":
			return key("interrupt");
		case "\x04":
			return key("eof");
		case "\r":
		case "\n":
			return key("enter");
		case "\t":
			return key("tab");
		case "\x7f":
		case "\x08":
			return key("backspace");
	}
	const code = ch.codePointAt(0) ?? 0;
	if (code >= 1 && code <= 26) {
		return { type: "ctrl", letter: String.fromCharCode(code + 96) };
	}
	// Remaining C0, DEL and C1 controls carry no text
	if (code < 0x20 || (code >= 0x80 && code <= 0x9f)) {
		return { type: "unknown", sequence: ch };
	}
	return { type: "char", char: ch };
}

// =============================================================================
// Decoder
// =============================================================================

export class KeyDecoder {
	private ended = false;

	constructor(private readonly input: InputQueue) {}

	/**
	 * Next key. The end of input reads as `eof` once; reading past it
	 * rejects with InputEndedError.
	 */
	async readKey(): Promise<KeyEvent> {
		const ch = await this.input.read();
		if (ch === null) {
			if (this.ended) throw new InputEndedError();
			this.ended = true;
			return key("eof");
		}
		if (ch !== ESC) return decodeCodePoint(ch);

		if (!this.input.hasBuffered()) return key("escape");
		const next = await this.input.read();
		if (next === null) return key("escape");
		if (next === ESC) {
			// Another key starts here; leave it for the next read
			this.input.unread(next);
			return key("escape");
		}
		if (next === "[") return this.readCsi();
		if (next === "O") return this.readSs3();
		return { type: "unknown", sequence: ESC + next };
	}

	private async readCsi(): Promise<KeyEvent> {
		let params = "";
		let final: string | null = null;
		while (this.input.hasBuffered()) {
			const ch = await this.input.read();
			if (ch === null) break;
			if (isCsiParameter(ch)) {
				params += ch;
				continue;
			}
			final = ch;
			break;
		}

		const sequence = `${ESC}[${params}${final ?? ""}`;
		if (final === null) {
			// Cut short after ESC [ <digits>: the digits alone name the key
			const byDigits = /^\d+$/.test(params) ? CSI_TILDE_KEYS[params] : undefined;
			return byDigits ? key(byDigits) : { type: "unknown", sequence };
		}
		if (final === "~") {
			const named = CSI_TILDE_KEYS[params];
			return named ? key(named) : { type: "unknown", sequence };
		}
		if (params === "") {
			const named = CSI_LETTER_KEYS[final];
			if (named) return key(named);
		}
		return { type: "unknown", sequence };
	}

	private async readSs3(): Promise<KeyEvent> {
		if (!this.input.hasBuffered()) return { type: "unknown", sequence: `${ESC}O` };
		const final = await this.input.read();
		if (final === null) return { type: "unknown", sequence: `${ESC}O` };
		const named = SS3_KEYS[final];
		return named ? key(named) : { type: "unknown", sequence: `${ESC}O${final}` };
	}
}

/**
 * Name a key event for keybinding lookup, or undefined if it cannot be bound.
 */
export function keyId(event: KeyEvent): string | undefined {
	switch (event.type) {
		case "key":
			return event.key;
		case "ctrl":
			return `ctrl+${event.letter}`;
		case "char":
			return event.char === " " ? "space" : event.char;
		case "unknown":
			return undefined;
	}
}

/** Printable text carried by the event, if any. */
export function printable(event: KeyEvent): string | undefined {
	return event.type === "char" ? event.char : undefined;
}
