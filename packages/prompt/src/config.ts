import { PromptConfigError } from "./errors.js";
import type { KeybindingsConfig } from "./keybindings.js";

/** What happens when moving past the first or last option. */
export type WrapPolicy = "clamp" | "wrap";

export interface PromptConfig {
	/** Maximum number of option rows shown at once. */
	maxVisible: number;
	/** Rows kept between the selection and the window edge while scrolling. */
	scrollMargin: number;
	wrap: WrapPolicy;
	/** Lists with more options than this get a search field. */
	searchThreshold: number;
	/** Option sets above this size are rejected. */
	maxOptions: number;
	keybindings: KeybindingsConfig;
}

export const DEFAULT_PROMPT_CONFIG: Readonly<PromptConfig> = {
	maxVisible: 10,
	scrollMargin: 3,
	wrap: "clamp",
	searchThreshold: 10,
	maxOptions: 256,
	keybindings: {},
};

function requireInteger(name: string, value: number, min: number): void {
	if (!Number.isInteger(value) || value < min) {
		throw new PromptConfigError(`${name} must be an integer >= ${min}, got ${value}`);
	}
}

/**
 * Merge per-invocation overrides over the defaults and validate the result.
 */
export function resolvePromptConfig(overrides: Partial<PromptConfig> = {}): PromptConfig {
	const config: PromptConfig = {
		...DEFAULT_PROMPT_CONFIG,
		...overrides,
		keybindings: { ...DEFAULT_PROMPT_CONFIG.keybindings, ...overrides.keybindings },
	};
	requireInteger("maxVisible", config.maxVisible, 1);
	requireInteger("scrollMargin", config.scrollMargin, 0);
	requireInteger("searchThreshold", config.searchThreshold, 0);
	requireInteger("maxOptions", config.maxOptions, 1);
	if (config.wrap !== "clamp" && config.wrap !== "wrap") {
		throw new PromptConfigError(`wrap must be "clamp" or "wrap", got ${String(config.wrap)}`);
	}
	return config;
}
