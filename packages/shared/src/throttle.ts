/**
 * Fetch throttle calculations.
 *
 * These functions decide whether a source was fetched too recently to be
 * fetched again. Timestamps are ISO-8601 strings as stored in the fetch log.
 * Internal calculations use milliseconds.
 */

const HOUR_MS = 60 * 60 * 1000;

/**
 * Hours elapsed since a stored timestamp.
 *
 * @returns Elapsed hours, or null if the timestamp cannot be parsed
 */
export function hoursSince(timestamp: string, now: number = Date.now()): number | null {
	const parsed = Date.parse(timestamp);
	if (Number.isNaN(parsed)) return null;
	return (now - parsed) / HOUR_MS;
}

/**
 * Check if the last fetch is still inside the minimum interval.
 *
 * An unparseable timestamp is never inside the interval, so the source
 * may be fetched.
 */
export function isWithinInterval(
	lastFetchTime: string,
	minIntervalHours: number,
	now: number = Date.now(),
): boolean {
	const elapsed = hoursSince(lastFetchTime, now);
	if (elapsed === null) return false;
	return elapsed < minIntervalHours;
}

/**
 * Get human-readable time until the source may be fetched again.
 *
 * @returns String like "2h 30m", "45m" or "now"
 */
export function formatRemaining(
	lastFetchTime: string,
	minIntervalHours: number,
	now: number = Date.now(),
): string {
	const parsed = Date.parse(lastFetchTime);
	if (Number.isNaN(parsed)) return "now";

	const diff = parsed + minIntervalHours * HOUR_MS - now;
	if (diff <= 0) return "now";

	const hours = Math.floor(diff / HOUR_MS);
	const minutes = Math.floor((diff % HOUR_MS) / (1000 * 60));

	if (hours > 0) return `${hours}h ${minutes}m`;
	return `${minutes}m`;
}
