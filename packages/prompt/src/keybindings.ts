import { type KeyEvent, type KeyId, keyId } from "./keys.js";

/**
 * Prompt actions that can be bound to keys.
 */
export type PromptAction =
	// Line editing
	| "cursorLeft"
	| "cursorRight"
	| "cursorLineStart"
	| "cursorLineEnd"
	| "deleteCharBackward"
	| "deleteCharForward"
	| "deleteToLineStart"
	| "deleteToLineEnd"
	| "submit"
	// Session control
	| "interrupt"
	| "cancel"
	// Lists
	| "selectUp"
	| "selectDown"
	| "selectUpAlt"
	| "selectDownAlt"
	| "selectPageUp"
	| "selectPageDown"
	| "selectFirst"
	| "selectLast"
	| "selectConfirm"
	| "toggle";

export type { KeyId };

export type KeybindingsConfig = {
	[A in PromptAction]?: KeyId | KeyId[];
};

/**
 * Default keybindings. The `*Alt` list bindings only apply while the list has
 * no search field, since those keys are typed into the query otherwise.
 */
export const DEFAULT_KEYBINDINGS: Required<KeybindingsConfig> = {
	cursorLeft: ["left", "ctrl+b"],
	cursorRight: ["right", "ctrl+f"],
	cursorLineStart: ["home", "ctrl+a"],
	cursorLineEnd: ["end", "ctrl+e"],
	deleteCharBackward: "backspace",
	deleteCharForward: "delete",
	deleteToLineStart: "ctrl+u",
	deleteToLineEnd: "ctrl+k",
	submit: ["enter", "eof"],
	interrupt: "interrupt",
	cancel: "escape",
	selectUp: ["up", "shift+tab"],
	selectDown: ["down", "tab"],
	selectUpAlt: ["k", "w"],
	selectDownAlt: ["j", "s"],
	selectPageUp: "pageUp",
	selectPageDown: "pageDown",
	selectFirst: "home",
	selectLast: "end",
	selectConfirm: ["enter", "eof"],
	toggle: "space",
};

function toArray(keys: KeyId | KeyId[]): KeyId[] {
	return Array.isArray(keys) ? [...keys] : [keys];
}

/**
 * Resolves key events to actions, defaults first and overrides on top.
 * The interrupt key stays bound to `interrupt` whatever the overrides say.
 */
export class Keybindings {
	private actionToKeys = new Map<PromptAction, KeyId[]>();

	constructor(config: KeybindingsConfig = {}) {
		for (const [action, keys] of Object.entries(DEFAULT_KEYBINDINGS) as [PromptAction, KeyId | KeyId[]][]) {
			this.actionToKeys.set(action, toArray(keys));
		}
		for (const [action, keys] of Object.entries(config) as [PromptAction, KeyId | KeyId[] | undefined][]) {
			if (keys === undefined) continue;
			this.actionToKeys.set(action, toArray(keys));
		}
		// Ctrl+C always interrupts; overrides can only add keys to it
		const interrupt = this.actionToKeys.get("interrupt") ?? [];
		if (!interrupt.includes("interrupt")) {
			this.actionToKeys.set("interrupt", ["interrupt", ...interrupt]);
		}
	}

	matches(event: KeyEvent, action: PromptAction): boolean {
		const id = keyId(event);
		if (id === undefined) return false;
		const keys = this.actionToKeys.get(action);
		return keys !== undefined && keys.some((k) => k === id);
	}

	getKeys(action: PromptAction): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}
}
