// Escape sequences
export {
	CSI,
	clearLine,
	columns,
	cursorColumn,
	cursorDown,
	cursorLeft,
	cursorMoveColumns,
	cursorMoveRows,
	cursorRight,
	cursorUp,
	ESC,
	hideCursor,
	showCursor,
	truncate,
} from "./ansi.js";
// Value kinds and validators
export { type Coerced, type FloatOptions, type IntegerOptions, kinds, parseBoolean, type ValueKind } from "./coerce.js";
export * as validators from "./validators.js";
export { type Validator, validate } from "./validators.js";
// Components
export { type ChecklistFields, type ChecklistOptions, checklist } from "./components/checklist.js";
export { type ConfirmFields, type ConfirmOptions, confirm, type EnterOptions, enter } from "./components/confirm.js";
export { type InputFields, type InputOptions, input } from "./components/input.js";
export { NO_OPTIONS_PLACEHOLDER } from "./components/list-prompt.js";
export {
	DownloadProgress,
	type DownloadProgressOptions,
	defaultProgressStyle,
	formatBytes,
	MultiProgress,
	PercentProgress,
	type PercentProgressOptions,
	Progress,
	type ProgressOptions,
	type ProgressStyle,
} from "./components/progress.js";
export { type SelectFields, type SelectOptions, select } from "./components/select.js";
// Configuration
export { DEFAULT_PROMPT_CONFIG, type PromptConfig, resolvePromptConfig, type WrapPolicy } from "./config.js";
export { InputEndedError, PromptConfigError } from "./errors.js";
export { Form } from "./form.js";
// Input
export { InputQueue, type TerminalInput } from "./input-queue.js";
// Keybindings
export {
	DEFAULT_KEYBINDINGS,
	Keybindings,
	type KeybindingsConfig,
	type PromptAction,
} from "./keybindings.js";
export { decodeCodePoint, KeyDecoder, type KeyEvent, type KeyId, keyId, printable, type SpecialKey } from "./keys.js";
// Editing and list state
export {
	diffLine,
	EditableText,
	EMPTY_PATCH,
	FittedLine,
	isEmptyPatch,
	LineEditor,
	type LinePatch,
	type LineWindow,
	scrollWindow,
} from "./line-editor.js";
export {
	ListController,
	type ListControllerOptions,
	type ListOption,
	type ListOutcome,
	type ListRedraw,
	type ListRow,
	type ListState,
	type ListStep,
	listCapacity,
	OptionSet,
	searchEnabled,
} from "./list-controller.js";
export { Mutex } from "./mutex.js";
export { Renderer } from "./renderer.js";
export { type PromptContext, type PromptOptions, type PromptResult, promptContext, runSession } from "./session.js";
// Terminal
export { ProcessTerminal, type Terminal, type TerminalStartOptions } from "./terminal.js";
export { defaultTheme, plainTheme, type PromptTheme } from "./theme.js";
