/**
 * Page fetching for source and detail pages.
 */

import { SCRAPE_CONFIG } from "@policy-pulse/shared";

export class HttpStatusError extends Error {
	constructor(
		readonly status: number,
		readonly url: string,
	) {
		super(`Request failed with status ${status}: ${url}`);
		this.name = "HttpStatusError";
	}
}

export interface FetchPageOptions {
	timeoutMs?: number;
}

/**
 * Function that fetches a page and returns its body text.
 * Sources and the content fetcher take one so tests can pass a stub.
 */
export type PageFetcher = (url: string) => Promise<string>;

/**
 * Fetch a page as text. Non-2xx responses throw `HttpStatusError`; a
 * timeout aborts the request.
 */
export async function fetchPage(
	url: string,
	options: FetchPageOptions = {},
): Promise<string> {
	const response = await fetch(url, {
		headers: {
			"User-Agent": SCRAPE_CONFIG.userAgent,
			"Accept-Language": SCRAPE_CONFIG.acceptLanguage,
			Accept: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
		},
		signal: AbortSignal.timeout(options.timeoutMs ?? SCRAPE_CONFIG.pageTimeoutMs),
	});

	if (!response.ok) {
		throw new HttpStatusError(response.status, url);
	}

	return response.text();
}

/**
 * Bind a page timeout into a `PageFetcher`.
 */
export function createPageFetcher(timeoutMs: number): PageFetcher {
	return (url) => fetchPage(url, { timeoutMs });
}
