/**
 * Serializes async work per key.
 *
 * Work submitted for the same key runs one at a time in submission order;
 * work for different keys runs concurrently. A failed task does not block
 * the tasks queued behind it.
 *
 * @example
 * ```typescript
 * const locks = new KeyedLock();
 * await locks.run(`deal:${dealId}`, () => readComputeWrite(dealId));
 * ```
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await task();
		} finally {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/**
	 * Number of keys with running or queued work.
	 */
	size(): number {
		return this.tails.size;
	}
}
