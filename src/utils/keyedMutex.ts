/**
 * In-memory per-key mutex.
 * Tasks sharing a key run one after another in arrival order; tasks with
 * different keys never wait on each other.
 *
 * @module utils/keyedMutex
 */

export class KeyedMutex {
	private readonly tails = new Map<string, Promise<void>>();

	/**
	 * Runs `task` once every earlier task for `key` has settled.
	 * The task's result or rejection is passed through unchanged.
	 *
	 * @example
	 * ```typescript
	 * const mutex = new KeyedMutex();
	 * await mutex.runExclusive(`${chatId}:${userId}`, async () => {
	 *   // read-modify-write for this member only
	 * });
	 * ```
	 */
	async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();

		let release: () => void = () => undefined;
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
			// Nobody queued behind us: drop the key so the map stays bounded
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/** Number of keys with a running or queued task */
	get activeKeys(): number {
		return this.tails.size;
	}
}

/** Lock key for state scoped to one member of one chat */
export const memberKey = (userId: number, chatId: number): string =>
	`${chatId}:${userId}`;
