/**
 * Per-source fetch throttling backed by the fetch log.
 */

import {
	createLogger,
	formatRemaining,
	isWithinInterval,
	type FetchLogEntry,
	type FetchStatus,
} from "@policy-pulse/shared";
import type { FetchLogStore } from "./policy-store";

const log = createLogger("analysis:throttle");

export class FetchThrottleController {
	constructor(
		private readonly store: FetchLogStore,
		private readonly now: () => number = Date.now,
	) {}

	/**
	 * True when the source was fetched less than `minIntervalHours` ago,
	 * whatever the outcome of that fetch. Missing or unreadable log entries
	 * allow the fetch.
	 */
	async shouldSkip(sourceName: string, minIntervalHours: number): Promise<boolean> {
		let entry: FetchLogEntry | null;
		try {
			entry = await this.store.getFetchLog(sourceName);
		} catch (error) {
			log.error({ err: error, sourceName }, "Could not read fetch log, allowing fetch");
			return false;
		}

		if (!entry) return false;

		const now = this.now();
		if (!isWithinInterval(entry.lastFetchTime, minIntervalHours, now)) return false;

		log.info(
			{
				sourceName,
				lastFetchTime: entry.lastFetchTime,
				nextFetchIn: formatRemaining(entry.lastFetchTime, minIntervalHours, now),
			},
			"Source fetched recently, skipping",
		);
		return true;
	}

	/**
	 * Record a fetch attempt. Failures to write are logged only.
	 */
	async recordStatus(
		sourceName: string,
		status: FetchStatus,
		recordsFetched: number,
		errorMessage: string | null = null,
	): Promise<void> {
		try {
			await this.store.recordFetch({
				sourceName,
				lastFetchTime: new Date(this.now()).toISOString(),
				status,
				errorMessage,
				recordsFetched,
			});
		} catch (error) {
			log.error({ err: error, sourceName, status }, "Could not record fetch status");
		}
	}
}
