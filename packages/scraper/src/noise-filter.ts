/**
 * Noise filter for link text scraped from list pages.
 */

import { SCRAPE_CONFIG, isPureDate } from "@policy-pulse/shared";
import keywords from "./keywords.json";

const REGISTRATION_PATTERNS = keywords.registrationPatterns.map(
	(pattern) => new RegExp(pattern),
);

/**
 * True when text is not a policy title: empty, a site registration number,
 * navigation or copyright boilerplate, a bare date, or too short.
 */
export function shouldSkipContent(text: string): boolean {
	const trimmed = text.trim();
	if (trimmed.length === 0) return true;

	const lower = trimmed.toLowerCase();

	if (REGISTRATION_PATTERNS.some((pattern) => pattern.test(lower))) return true;
	if (keywords.boilerplate.some((keyword) => lower.includes(keyword))) return true;

	if (trimmed.length < SCRAPE_CONFIG.minTextLength) return true;
	if (isPureDate(trimmed)) return true;

	return false;
}
