import { clearLine, cursorDown, cursorUp, truncate } from "../ansi.js";
import { Mutex } from "../mutex.js";
import { ProcessTerminal, type Terminal } from "../terminal.js";

/** Renders a bar of exactly `width` cells for a fraction in [0, 1]. */
export type ProgressStyle = (width: number, fraction: number) => string;

/**
 * `[####----]`. A NaN fraction (unknown total) draws an empty frame.
 */
export const defaultProgressStyle: ProgressStyle = (width, fraction) => {
	if (width < 3) return " ".repeat(Math.max(0, width));
	const inner = width - 2;
	if (Number.isNaN(fraction)) return `[${" ".repeat(inner)}]`;
	const f = Math.max(0, Math.min(1, fraction));
	const filled = Math.floor(f * inner + 0.5);
	return `[${"#".repeat(filled)}${"-".repeat(inner - filled)}]`;
};

export interface ProgressOptions {
	terminal?: Terminal;
	prefix?: string;
	suffix?: string;
	style?: ProgressStyle;
	/** Stop and re-raise on an external interrupt (default true) */
	watchInterrupt?: boolean;
}

/**
 * Single-row progress bar drawn on the row above the cursor.
 *
 * While active, an external interrupt stops the bar and is re-raised so the
 * process still gets its default interrupt handling.
 */
export class Progress {
	protected readonly terminal: Terminal;
	protected prefix: string;
	protected suffix: string;
	private readonly style: ProgressStyle;
	private readonly watchInterrupt: boolean;
	private active = false;
	private unwatch?: () => void;

	constructor(options: ProgressOptions = {}) {
		this.terminal = options.terminal ?? new ProcessTerminal();
		this.prefix = options.prefix ?? "";
		this.suffix = options.suffix ?? "";
		this.style = options.style ?? defaultProgressStyle;
		this.watchInterrupt = options.watchInterrupt ?? true;
	}

	get isActive(): boolean {
		return this.active;
	}

	/** Reserve a row for the bar. Calling it again while active does nothing. */
	start(): void {
		if (this.active) return;
		this.active = true;
		if (this.watchInterrupt) {
			this.unwatch = this.terminal.onInterrupt(() => {
				this.stop();
				this.terminal.interrupt();
			});
		}
		this.terminal.write("\r\n");
	}

	stop(): void {
		if (!this.active) return;
		this.active = false;
		this.unwatch?.();
		this.unwatch = undefined;
	}

	print(fraction: number): void {
		if (!this.active) return;
		this.terminal.write(this.frame(fraction));
	}

	/** Bar row text for the current terminal width. */
	render(fraction: number): string {
		const width = Math.max(0, this.terminal.columns - 1);
		const fixed = this.prefix.length + this.suffix.length;
		if (fixed >= width) return truncate(this.prefix + this.suffix, width);
		return this.prefix + this.style(width - fixed, fraction) + this.suffix;
	}

	/**
	 * Redraw the bar on the row `rowsBelow + 1` rows above the cursor and
	 * return the cursor to where it was.
	 */
	protected frame(fraction: number, rowsBelow = 0): string {
		return `${cursorUp(rowsBelow)}\r${cursorUp(1)}${clearLine}${this.render(fraction)}\r\n${cursorDown(rowsBelow)}`;
	}
}

export interface PercentProgressOptions extends ProgressOptions {
	maximum: number;
}

/** Bar with a right-aligned percentage, fed with absolute or relative values. */
export class PercentProgress extends Progress {
	private value = 0;
	private readonly maximum: number;

	constructor(options: PercentProgressOptions) {
		super({ ...options, suffix: "    %" });
		this.maximum = options.maximum;
	}

	add(value: number): void {
		this.set(this.value + value);
	}

	set(value: number): void {
		this.value = value;
		const fraction = this.value / this.maximum;
		this.suffix = ` ${(fraction * 100).toFixed(0).padStart(3)}%`;
		this.print(fraction);
	}
}

/** Human-readable byte count with one decimal: GB, MB, kB or B. */
export function formatBytes(n: number): string {
	const units: Array<[factor: number, unit: string]> = [
		[1e9, "GB"],
		[1e6, "MB"],
		[1e3, "kB"],
	];
	for (const [factor, unit] of units) {
		if (Math.trunc(n / factor) > 0) return `${(n / factor).toFixed(1)} ${unit}`;
	}
	return `${n.toFixed(1)} B`;
}

export interface DownloadProgressOptions extends ProgressOptions {
	/** Expected byte count; unknown totals show `?%` */
	total?: number;
	/** Milliseconds clock used for the transfer rate */
	now?: () => number;
}

/**
 * Tracks bytes flowing through an async byte stream. Iterating the instance
 * starts the bar, passes chunks through and stops it at the end of the
 * stream, on error, or once the expected total has arrived.
 */
export class DownloadProgress extends Progress implements AsyncIterable<Uint8Array> {
	private value = 0;
	private readonly total?: number;
	private readonly now: () => number;
	private lastTime: number;
	private lastValue = 0;

	constructor(
		private readonly source: AsyncIterable<Uint8Array>,
		options: DownloadProgressOptions = {},
	) {
		super(options);
		this.total = options.total !== undefined && options.total > 0 ? options.total : undefined;
		this.now = options.now ?? Date.now;
		this.lastTime = this.now();
	}

	get received(): number {
		return this.value;
	}

	add(bytes: number): Promise<void> {
		return this.set(this.value + bytes);
	}

	async set(bytes: number): Promise<void> {
		this.value = bytes;
		await this.update();
	}

	async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
		this.start();
		await this.update();
		try {
			for await (const chunk of this.source) {
				await this.add(chunk.byteLength);
				yield chunk;
				if (this.total !== undefined && this.value >= this.total) break;
			}
		} finally {
			this.stop();
		}
	}

	/** Size, rate and percentage since the previous measurement. */
	protected measure(): { suffix: string; fraction: number } {
		const time = this.now();
		const seconds = (time - this.lastTime) / 1000;
		const rate = seconds > 0 ? Math.round((this.value - this.lastValue) / seconds) : 0;
		this.lastTime = time;
		this.lastValue = this.value;

		const size = formatBytes(this.value).padStart(8);
		const speed = `${formatBytes(rate)}/s`.padStart(10);
		if (this.total === undefined) {
			return { suffix: ` ${size}, ${speed},   ?%`, fraction: Number.NaN };
		}
		const fraction = this.value / this.total;
		return { suffix: ` ${size}, ${speed}, ${(fraction * 100).toFixed(0).padStart(3)}%`, fraction };
	}

	protected async update(): Promise<void> {
		const { suffix, fraction } = this.measure();
		this.suffix = suffix;
		this.print(fraction);
	}
}

/**
 * Several download bars stacked on one terminal, one row each in the order
 * they were added. Every row update moves the shared cursor, so it holds the
 * lock for the duration of that single write.
 */
export class MultiProgress {
	private readonly rows: MultiProgressRow[] = [];
	readonly lock = new Mutex();
	private readonly terminal: Terminal;
	private readonly style?: ProgressStyle;
	private unwatch?: () => void;

	constructor(options: { terminal?: Terminal; style?: ProgressStyle } = {}) {
		this.terminal = options.terminal ?? new ProcessTerminal();
		this.style = options.style;
	}

	get size(): number {
		return this.rows.length;
	}

	/**
	 * Reserve a row at the bottom; iterate the result to drive the transfer.
	 * Call stop() once every transfer is done.
	 */
	add(
		prefix: string,
		source: AsyncIterable<Uint8Array>,
		options: { total?: number; now?: () => number } = {},
	): DownloadProgress {
		if (!this.unwatch) {
			this.unwatch = this.terminal.onInterrupt(() => {
				this.stop();
				this.terminal.interrupt();
			});
		}
		const row = new MultiProgressRow(this, this.rows.length, source, {
			...options,
			prefix,
			terminal: this.terminal,
			style: this.style,
			watchInterrupt: false,
		});
		this.rows.push(row);
		row.start();
		return row;
	}

	stop(): void {
		for (const row of this.rows) row.stop();
		this.unwatch?.();
		this.unwatch = undefined;
	}
}

class MultiProgressRow extends DownloadProgress {
	constructor(
		private readonly parent: MultiProgress,
		private readonly index: number,
		source: AsyncIterable<Uint8Array>,
		options: DownloadProgressOptions,
	) {
		super(source, options);
	}

	protected override async update(): Promise<void> {
		await this.parent.lock.runExclusive(() => {
			if (!this.isActive) return;
			const { suffix, fraction } = this.measure();
			this.suffix = suffix;
			this.terminal.write(this.frame(fraction, this.parent.size - this.index - 1));
		});
	}
}
