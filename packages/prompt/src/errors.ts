/**
 * Raised for invalid prompt configuration: empty or oversized option sets,
 * out-of-range window settings, bad initial selections. Always thrown before
 * the terminal is switched to raw mode.
 */
export class PromptConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PromptConfigError";
	}
}

/**
 * Raised when a prompt keeps reading after its input has ended, e.g. when a
 * value that fails validation is submitted by end-of-input.
 */
export class InputEndedError extends Error {
	constructor() {
		super("input ended");
		this.name = "InputEndedError";
	}
}
