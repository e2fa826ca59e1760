import chalk from "chalk";

export interface PromptTheme {
	/** The row under the list cursor. */
	selected: (text: string) => string;
	/** Validation errors shown next to the input line. */
	error: (text: string) => string;
}

export const defaultTheme: PromptTheme = {
	selected: (text) => chalk.bold(text),
	error: (text) => chalk.bold.red(text),
};

export const plainTheme: PromptTheme = {
	selected: (text) => text,
	error: (text) => text,
};
