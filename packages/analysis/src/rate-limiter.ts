/**
 * Sliding-window rate limiter for LLM calls.
 *
 * Callers queue on an internal promise chain, so the window check and the
 * admission record happen for one caller at a time.
 */

import { createLogger, sleep as defaultSleep } from "@policy-pulse/shared";

const log = createLogger("analysis:rate-limiter");

export interface RateLimiterOptions {
	maxCalls: number;
	windowMs: number;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
	private readonly maxCalls: number;
	private readonly windowMs: number;
	private readonly now: () => number;
	private readonly sleep: (ms: number) => Promise<void>;

	// Admission timestamps inside the current window, oldest first
	private readonly admissions: number[] = [];
	private tail: Promise<unknown> = Promise.resolve();

	constructor(options: RateLimiterOptions) {
		if (options.maxCalls < 1) throw new RangeError("maxCalls must be at least 1");
		this.maxCalls = options.maxCalls;
		this.windowMs = options.windowMs;
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? defaultSleep;
	}

	/**
	 * Wait until the window has room, then record the call.
	 *
	 * @returns The admission time
	 */
	acquire(): Promise<number> {
		const turn = this.tail.then(() => this.admit());
		// The next caller waits for this turn to settle either way; a rejection
		// still reaches this caller through `turn`.
		this.tail = turn.then(
			() => undefined,
			() => undefined,
		);
		return turn;
	}

	private async admit(): Promise<number> {
		for (;;) {
			const now = this.now();
			while (this.admissions.length > 0 && now - this.admissions[0] >= this.windowMs) {
				this.admissions.shift();
			}

			if (this.admissions.length < this.maxCalls) {
				this.admissions.push(now);
				return now;
			}

			const waitMs = this.admissions[0] + this.windowMs - now;
			log.debug({ waitMs }, "Rate limit reached, waiting");
			await this.sleep(waitMs);
		}
	}
}
