/**
 * Async iterator-based pagination over a policy source.
 *
 * Yields candidates page by page so callers can stop early.
 */

import {
	SCRAPE_CONFIG,
	createLogger,
	sleep,
	type PolicyCandidate,
} from "@policy-pulse/shared";
import type { PolicySource } from "./types";

const log = createLogger("scraper:list");

export interface ScrapeOptions {
	targetMonth?: string;
	maxPages?: number;
	/** Delay between page requests */
	pageDelayMs?: number;
	today?: string;
}

/**
 * Thrown when not a single page of a source could be fetched and parsed.
 */
export class SourceUnavailableError extends Error {
	constructor(
		readonly sourceName: string,
		readonly pagesAttempted: number,
		readonly lastError: unknown,
	) {
		const reason = lastError instanceof Error ? lastError.message : String(lastError);
		super(`All ${pagesAttempted} page(s) of ${sourceName} failed: ${reason}`);
		this.name = "SourceUnavailableError";
	}
}

/**
 * Async iterator that yields candidates page by page.
 *
 * A page that fails to fetch or parse is logged and counts as a page with
 * no candidates. Pagination ends after three consecutive empty pages or at
 * the page limit. If every attempted page failed, the source as a whole is
 * unavailable and the iterator throws.
 */
export async function* scrapeSource(
	source: PolicySource,
	options: ScrapeOptions = {},
): AsyncGenerator<PolicyCandidate[], void, unknown> {
	const maxPages = options.maxPages ?? source.maxPages;
	const pageDelayMs = options.pageDelayMs ?? SCRAPE_CONFIG.pageDelayMs;

	let emptyStreak = 0;
	let attempted = 0;
	let failed = 0;
	let lastError: unknown = null;

	for (let pageIndex = 0; pageIndex < maxPages; pageIndex++) {
		if (pageIndex > 0 && pageDelayMs > 0) {
			await sleep(pageDelayMs);
		}

		const url = source.pageUrl(pageIndex);
		let candidates: PolicyCandidate[] = [];
		attempted++;

		try {
			const raw = await source.fetchSourcePage(url);
			candidates = source.extractCandidates(raw, {
				targetMonth: options.targetMonth,
				pageUrl: url,
				today: options.today,
			});
			log.info({ source: source.name, page: pageIndex + 1, count: candidates.length }, "Scraped page");
		} catch (error) {
			failed++;
			lastError = error;
			log.warn({ source: source.name, url, err: error }, "Page failed");
		}

		if (candidates.length > 0) {
			emptyStreak = 0;
			yield candidates;
			continue;
		}

		emptyStreak++;
		if (emptyStreak >= SCRAPE_CONFIG.maxConsecutiveEmptyPages) {
			log.info({ source: source.name, page: pageIndex + 1 }, "Reached end of source");
			break;
		}
	}

	if (attempted > 0 && failed === attempted) {
		throw new SourceUnavailableError(source.name, attempted, lastError);
	}
}

/**
 * Scrape a source and return all candidates.
 * Convenience function for full scrapes.
 */
export async function scrapeAll(
	source: PolicySource,
	options: ScrapeOptions = {},
): Promise<PolicyCandidate[]> {
	const all: PolicyCandidate[] = [];

	for await (const candidates of scrapeSource(source, options)) {
		all.push(...candidates);
	}

	return all;
}
