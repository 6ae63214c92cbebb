/**
 * Per-owner serialization of booking writes within one process.
 */

export interface OwnerLock {
	/**
	 * Runs `task` once every earlier task for the same owner has settled.
	 * Tasks for different owners run concurrently.
	 */
	run<T>(ownerId: string, task: () => Promise<T>): Promise<T>;
	/** Number of owners with queued or running tasks */
	readonly pending: number;
}

export function createOwnerLock(): OwnerLock {
	const tails = new Map<string, Promise<void>>();

	return {
		async run<T>(ownerId: string, task: () => Promise<T>): Promise<T> {
			const previous = tails.get(ownerId) ?? Promise.resolve();
			const current = previous.then(task);
			// The chain only orders tasks; the caller sees failures through `current`.
			const tail = current.then(
				() => undefined,
				() => undefined,
			);
			tails.set(ownerId, tail);

			try {
				return await current;
			} finally {
				if (tails.get(ownerId) === tail) {
					tails.delete(ownerId);
				}
			}
		},
		get pending() {
			return tails.size;
		},
	};
}
