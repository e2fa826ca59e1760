import { type PromptConfig, resolvePromptConfig } from "./config.js";
import { Keybindings } from "./keybindings.js";
import { KeyDecoder } from "./keys.js";
import { ProcessTerminal, type Terminal } from "./terminal.js";
import { defaultTheme, type PromptTheme } from "./theme.js";

/**
 * How a prompt ended. Interrupt (Ctrl+C) and Escape are outcomes, not errors;
 * only input failures reject.
 */
export type PromptResult<T> = { status: "accepted"; value: T } | { status: "cancelled" } | { status: "escaped" };

/** Options shared by every prompt. */
export interface PromptOptions {
	terminal?: Terminal;
	theme?: PromptTheme;
	config?: Partial<PromptConfig>;
}

export interface PromptContext {
	terminal: Terminal;
	theme: PromptTheme;
	config: PromptConfig;
	keybindings: Keybindings;
}

/**
 * Resolve the shared options. Configuration errors surface here, before the
 * terminal is touched.
 */
export function promptContext(options: PromptOptions = {}): PromptContext {
	const config = resolvePromptConfig(options.config);
	return {
		terminal: options.terminal ?? new ProcessTerminal(),
		theme: options.theme ?? defaultTheme,
		config,
		keybindings: new Keybindings(config.keybindings),
	};
}

/**
 * Run one raw-mode session: start the terminal, hand the key decoder to
 * `body`, and always restore the terminal afterwards. A cancelled result
 * re-raises the interrupt once the terminal is back in its previous mode.
 */
export async function runSession<T>(
	terminal: Terminal,
	options: { hideCursor?: boolean },
	body: (keys: KeyDecoder) => Promise<PromptResult<T>>,
): Promise<PromptResult<T>> {
	terminal.start({ hideCursor: options.hideCursor });

	let result: PromptResult<T>;
	try {
		result = await body(new KeyDecoder(terminal.input));
	} finally {
		terminal.stop();
	}

	if (result.status === "cancelled") {
		terminal.interrupt();
	}
	return result;
}
