/**
 * InputQueue buffers terminal input and hands it out one code point at a time.
 *
 * Chunk boundaries are kept: a terminal writes a whole escape sequence in a
 * single chunk, so `hasBuffered()` only reports code points that arrived
 * together with the one just read. That is what lets the key decoder tell a
 * bare Escape press from the start of a CSI sequence without waiting.
 *
 * A terminal owns one queue for its lifetime, so code points left unread
 * when a prompt ends go to the next prompt.
 */

export interface TerminalInput {
	data(chunk: string): void;
	end(): void;
	error(error: Error): void;
}

type Waiter = {
	resolve: (codePoint: string | null) => void;
	reject: (error: Error) => void;
};

export class InputQueue implements TerminalInput {
	private chunks: string[][] = [];
	private waiter: Waiter | null = null;
	private ended = false;
	private failure: Error | null = null;

	data(chunk: string): void {
		const points = Array.from(chunk);
		if (points.length === 0) return;
		this.chunks.push(points);
		this.wake();
	}

	end(): void {
		this.ended = true;
		this.wake();
	}

	error(error: Error): void {
		if (this.failure) return;
		this.failure = error;
		this.wake();
	}

	/**
	 * Next code point. Resolves to null once input has ended and everything
	 * buffered was consumed; rejects with the read failure verbatim.
	 */
	read(): Promise<string | null> {
		const next = this.take();
		if (next !== undefined) return Promise.resolve(next);
		if (this.failure) return Promise.reject(this.failure);
		if (this.ended) return Promise.resolve(null);
		return new Promise((resolve, reject) => {
			this.waiter = { resolve, reject };
		});
	}

	/** True if more code points from the current chunk are ready. */
	hasBuffered(): boolean {
		const current = this.chunks[0];
		return current !== undefined && current.length > 0;
	}

	/** Put a code point back in front of the current chunk. */
	unread(codePoint: string): void {
		const current = this.chunks[0];
		if (current) current.unshift(codePoint);
		else this.chunks.unshift([codePoint]);
	}

	private take(): string | undefined {
		// Exhausted chunks are dropped lazily so hasBuffered() stays false
		// until the next read crosses into the following chunk.
		while (this.chunks.length > 0 && this.chunks[0]?.length === 0) {
			this.chunks.shift();
		}
		return this.chunks[0]?.shift();
	}

	private wake(): void {
		const waiter = this.waiter;
		if (!waiter) return;
		const next = this.take();
		if (next !== undefined) {
			this.waiter = null;
			waiter.resolve(next);
		} else if (this.failure) {
			this.waiter = null;
			waiter.reject(this.failure);
		} else if (this.ended) {
			this.waiter = null;
			waiter.resolve(null);
		}
	}
}
