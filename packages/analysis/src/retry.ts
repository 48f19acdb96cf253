/**
 * Retry with exponential backoff.
 */

import { createLogger, sleep as defaultSleep, type Result } from "@policy-pulse/shared";

const log = createLogger("analysis:retry");

export interface RetryPolicy {
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	jitterMs: number;
	isRetryable: (error: unknown) => boolean;
}

export interface RetryFailure {
	/** "exhausted" when retryable errors used up every attempt */
	type: "exhausted" | "permanent";
	error: unknown;
	attempts: number;
}

export interface RetryOptions {
	sleep?: (ms: number) => Promise<void>;
	random?: () => number;
	label?: string;
}

/**
 * Delay before the retry that follows attempt `attempt` (zero-based):
 * base * 2^attempt plus up to `jitterMs` of jitter, capped at `maxDelayMs`.
 */
export function computeBackoffDelay(
	attempt: number,
	policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs" | "jitterMs">,
	random: () => number = Math.random,
): number {
	const delay = policy.baseDelayMs * 2 ** attempt + random() * policy.jitterMs;
	return Math.min(delay, policy.maxDelayMs);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Run an operation until it succeeds, fails with a non-retryable error, or
 * runs out of attempts. Never throws.
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	policy: RetryPolicy,
	options: RetryOptions = {},
): Promise<Result<{ value: T; attempts: number }, RetryFailure>> {
	const sleep = options.sleep ?? defaultSleep;
	const random = options.random ?? Math.random;
	let lastError: unknown = new Error("No attempts were made");

	for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
		try {
			const value = await operation(attempt);
			return { success: true, data: { value, attempts: attempt + 1 } };
		} catch (error) {
			lastError = error;

			if (!policy.isRetryable(error)) {
				log.warn({ label: options.label, attempt: attempt + 1, err: error }, "Permanent failure, not retrying");
				return { success: false, error: { type: "permanent", error, attempts: attempt + 1 } };
			}

			if (attempt + 1 >= policy.maxAttempts) break;

			const delayMs = computeBackoffDelay(attempt, policy, random);
			log.warn(
				{ label: options.label, attempt: attempt + 1, delayMs: Math.round(delayMs), error: errorMessage(error) },
				"Transient failure, retrying",
			);
			await sleep(delayMs);
		}
	}

	log.error({ label: options.label, attempts: policy.maxAttempts, err: lastError }, "Retries exhausted");
	return {
		success: false,
		error: { type: "exhausted", error: lastError, attempts: Math.max(policy.maxAttempts, 0) },
	};
}
