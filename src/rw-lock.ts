type LockMode = "read" | "write";

type Waiter = { mode: LockMode; grant: () => void };

/**
 * Promise based reader/writer lock.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer is not overtaken by
 * readers that arrive after it.
 *
 * Not re-entrant: awaiting `write()` from inside a `write()` callback of the same
 * lock never settles.
 *
 * @example
 * ```typescript
 * const lock = new ReadWriteLock();
 * await lock.write(async () => { value = await load(); });
 * const snapshot = await lock.read(() => value);
 * ```
 */
export class ReadWriteLock {
	#readers = 0;
	#writing = false;
	#queue: Waiter[] = [];

	/** Number of callers currently holding the lock in shared mode. */
	get readers(): number {
		return this.#readers;
	}

	/** Whether a caller currently holds the lock exclusively. */
	get writing(): boolean {
		return this.#writing;
	}

	/** Number of callers waiting for the lock. */
	get pending(): number {
		return this.#queue.length;
	}

	/**
	 * Runs `fn` while holding the lock in shared mode.
	 * @returns Whatever `fn` returns (or resolves to)
	 */
	async read<T>(fn: () => T | Promise<T>): Promise<T> {
		await this.#acquire("read");
		try {
			return await fn();
		} finally {
			this.#release("read");
		}
	}

	/**
	 * Runs `fn` while holding the lock exclusively.
	 * @returns Whatever `fn` returns (or resolves to)
	 */
	async write<T>(fn: () => T | Promise<T>): Promise<T> {
		await this.#acquire("write");
		try {
			return await fn();
		} finally {
			this.#release("write");
		}
	}

	#available(mode: LockMode): boolean {
		if (mode === "read") return !this.#writing;
		return !this.#writing && this.#readers === 0;
	}

	#take(mode: LockMode): void {
		if (mode === "read") this.#readers++;
		else this.#writing = true;
	}

	#acquire(mode: LockMode): Promise<void> {
		if (!this.#queue.length && this.#available(mode)) {
			this.#take(mode);
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			this.#queue.push({
				mode,
				grant: () => {
					this.#take(mode);
					resolve();
				},
			});
		});
	}

	#release(mode: LockMode): void {
		if (mode === "read") this.#readers--;
		else this.#writing = false;

		// hand over to the head of the queue; consecutive readers go together
		while (this.#queue.length && this.#available(this.#queue[0].mode)) {
			const next = this.#queue.shift();
			if (!next) break;
			next.grant();
			if (next.mode === "write") break;
		}
	}
}
