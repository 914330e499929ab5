// ---------------------------------------------------------------------------
// Promise-based mutex for critical sections
// ---------------------------------------------------------------------------

export class SimpleMutex {
	private locked = false;
	private queue: Array<() => void> = [];

	get isLocked(): boolean {
		return this.locked;
	}

	async acquire(): Promise<void> {
		return new Promise((resolve) => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				// Ownership passes straight to the next waiter; `locked` stays true
				this.queue.push(() => resolve());
			}
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
