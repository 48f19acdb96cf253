/**
 * Date utility functions for announcement dates.
 *
 * Announcements are dated in China Standard Time (UTC+8).
 */

const CST_OFFSET_MS = 8 * 60 * 60 * 1000;

// "2025-06-03", "2025/6/3", "2025年6月3日"
const DATE_PATTERN = /(\d{4})\s*[-/年]\s*(\d{1,2})\s*[-/月]\s*(\d{1,2})/;

/**
 * Find the first date-shaped substring and normalize it to YYYY-MM-DD.
 * Returns null when nothing in the text looks like a valid calendar date.
 */
export function extractDate(text: string): string | null {
	const match = text.match(DATE_PATTERN);
	if (!match) return null;

	const [, year, month, day] = match;
	const monthNum = parseInt(month, 10);
	const dayNum = parseInt(day, 10);

	if (monthNum < 1 || monthNum > 12 || dayNum < 1 || dayNum > 31) return null;

	return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

/**
 * True when the whole (trimmed) string is just a date.
 */
export function isPureDate(text: string): boolean {
	return /^\d{4}[-/]\d{1,2}[-/]\d{1,2}$/.test(text.trim());
}

/**
 * Today's date in China Standard Time.
 */
export function todayCst(now: Date = new Date()): string {
	return new Date(now.getTime() + CST_OFFSET_MS).toISOString().slice(0, 10);
}

/**
 * Check a "YYYY-MM" month filter.
 */
export function isValidTargetMonth(month: string): boolean {
	const match = month.match(/^(\d{4})-(\d{2})$/);
	if (!match) return false;
	const monthNum = parseInt(match[2], 10);
	return monthNum >= 1 && monthNum <= 12;
}

/**
 * True when a YYYY-MM-DD date falls in the YYYY-MM month.
 */
export function isInMonth(date: string, month: string): boolean {
	return date.startsWith(`${month}-`);
}
