import koffi from "koffi";
import { hideCursor, showCursor } from "./ansi.js";
import { logWrite } from "./debug.js";
import { InputQueue } from "./input-queue.js";

export interface TerminalStartOptions {
	/** Hide the cursor until stop(). */
	hideCursor?: boolean;
}

/**
 * Minimal terminal interface for prompts
 */
export interface Terminal {
	/**
	 * Keys read by prompts. The queue outlives a single prompt: what one
	 * prompt leaves unread is read by the next.
	 */
	readonly input: InputQueue;

	/**
	 * Enter raw mode (no echo, no line buffering, Ctrl+C delivered as data)
	 * and feed `input` until stop().
	 */
	start(options?: TerminalStartOptions): void;

	// Restore the state saved by start(). Safe to call more than once.
	stop(): void;

	write(data: string): void;

	get columns(): number;
	get rows(): number;

	// Deliver SIGINT to the own process, after the terminal was restored
	interrupt(): void;

	/**
	 * Watch for an interrupt request while not in raw mode (e.g. during a
	 * progress bar). Returns a function that removes the watcher.
	 */
	onInterrupt(handler: () => void): () => void;
}

let stdinInput: InputQueue | undefined;

// stdin is shared by every ProcessTerminal, so its listeners are attached once
function stdinQueue(): InputQueue {
	if (!stdinInput) {
		const queue = new InputQueue();
		process.stdin.setEncoding("utf8");
		process.stdin.on("data", (data: string | Buffer) => {
			queue.data(typeof data === "string" ? data : data.toString("utf8"));
		});
		process.stdin.on("end", () => queue.end());
		process.stdin.on("error", (error: Error) => queue.error(error));
		stdinInput = queue;
	}
	return stdinInput;
}

/**
 * Real terminal using process.stdin/stdout
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private started = false;
	private cursorHidden = false;

	get input(): InputQueue {
		return stdinQueue();
	}

	start(options: TerminalStartOptions = {}): void {
		if (this.started) {
			throw new Error("terminal already started");
		}
		this.started = true;
		stdinQueue();

		// Save previous state and enable raw mode
		this.wasRaw = process.stdin.isRaw || false;
		if (process.stdin.isTTY && process.stdin.setRawMode) {
			process.stdin.setRawMode(true);
		}
		process.stdin.resume();

		// Must run after setRawMode(true), which resets the console mode flags
		this.enableWindowsVTInput();

		if (options.hideCursor) {
			this.cursorHidden = true;
			this.write(hideCursor);
		}
	}

	/**
	 * On Windows, add ENABLE_VIRTUAL_TERMINAL_INPUT (0x0200) to the stdin
	 * console handle so arrow keys arrive as VT sequences instead of console
	 * events the decoder cannot see.
	 */
	private enableWindowsVTInput(): void {
		if (process.platform !== "win32") return;
		try {
			const k32 = koffi.load("kernel32.dll");
			const GetStdHandle = k32.func("void* __stdcall GetStdHandle(int)");
			const GetConsoleMode = k32.func("bool __stdcall GetConsoleMode(void*, _Out_ uint32_t*)");
			const SetConsoleMode = k32.func("bool __stdcall SetConsoleMode(void*, uint32_t)");

			const STD_INPUT_HANDLE = -10;
			const ENABLE_VIRTUAL_TERMINAL_INPUT = 0x0200;
			const handle = GetStdHandle(STD_INPUT_HANDLE);
			const mode = new Uint32Array(1);
			GetConsoleMode(handle, mode);
			SetConsoleMode(handle, (mode[0] ?? 0) | ENABLE_VIRTUAL_TERMINAL_INPUT);
		} catch {
			// koffi not available: arrow keys may arrive as console events only
		}
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;

		// Keys that arrive until the next prompt wait in the stream
		process.stdin.pause();

		if (process.stdin.isTTY && process.stdin.setRawMode) {
			process.stdin.setRawMode(this.wasRaw);
		}
		if (this.cursorHidden) {
			this.cursorHidden = false;
			this.write(showCursor);
		}
	}

	write(data: string): void {
		process.stdout.write(data);
		logWrite(data);
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	interrupt(): void {
		process.kill(process.pid, "SIGINT");
	}

	onInterrupt(handler: () => void): () => void {
		process.on("SIGINT", handler);
		return () => {
			process.removeListener("SIGINT", handler);
		};
	}
}
