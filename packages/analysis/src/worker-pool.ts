/**
 * Bounded-concurrency fan-out: N async workers pull items from a shared
 * cursor until the list is drained.
 */

export type PoolOutcome<R> =
	| { status: "fulfilled"; value: R }
	| { status: "rejected"; reason: unknown }
	| { status: "skipped" };

export interface PoolOptions {
	concurrency: number;
	/** Checked before each item starts; false marks the item skipped */
	canStart?: () => boolean;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Outcomes are returned in item order.
 */
export async function runPool<T, R>(
	items: readonly T[],
	worker: (item: T, index: number) => Promise<R>,
	options: PoolOptions,
): Promise<PoolOutcome<R>[]> {
	const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: "skipped" }));
	const canStart = options.canStart ?? (() => true);
	let cursor = 0;

	const runWorker = async (): Promise<void> => {
		while (cursor < items.length) {
			const index = cursor++;
			if (!canStart()) continue;

			try {
				outcomes[index] = { status: "fulfilled", value: await worker(items[index], index) };
			} catch (error) {
				outcomes[index] = { status: "rejected", reason: error };
			}
		}
	};

	const workerCount = Math.max(1, Math.min(options.concurrency, items.length));
	await Promise.all(Array.from({ length: workerCount }, runWorker));

	return outcomes;
}
