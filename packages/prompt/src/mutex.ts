type QueuedWork = () => void;

/**
 * FIFO lock for async sections. Work queued while the lock is held runs in
 * arrival order once the holder finishes.
 */
export class Mutex {
	private queue: QueuedWork[] = [];
	private locked = false;

	get isLocked(): boolean {
		return this.locked;
	}

	/** Number of callers waiting for the lock. */
	size(): number {
		return this.queue.length;
	}

	async runExclusive<T>(work: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await work();
		} finally {
			this.release();
		}
	}

	private acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.queue.push(resolve);
		});
	}

	private release(): void {
		const next = this.queue.shift();
		if (next) {
			// Ownership passes straight to the next waiter
			next();
		} else {
			this.locked = false;
		}
	}
}
