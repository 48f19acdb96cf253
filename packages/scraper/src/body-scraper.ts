/**
 * Full-text extraction from a policy detail page.
 */

import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import { SCRAPE_CONFIG, createLogger, type Result } from "@policy-pulse/shared";
import { fetchPage, type PageFetcher } from "./http";
import keywords from "./keywords.json";

const log = createLogger("scraper:body");

export type ContentFetchError =
	| { type: "fetch_failed"; message: string; cause: unknown }
	| { type: "too_short"; length: number };

// Trimmed, non-empty text nodes in document order
function textLines(node: AnyNode, lines: string[] = []): string[] {
	if (isText(node)) {
		const text = node.data.trim();
		if (text) lines.push(text);
	} else if (hasChildren(node)) {
		for (const child of node.children) {
			textLines(child, lines);
		}
	}
	return lines;
}

/**
 * Extract the main text of a detail page.
 *
 * Known content containers are tried in order and the first with enough
 * text wins. Otherwise the page body is used, keeping lines long enough to
 * be prose and without navigation keywords.
 */
export function extractMainText(html: string): string {
	const $ = cheerio.load(html);
	$("script, style, noscript").remove();

	for (const selector of keywords.contentSelectors) {
		const element = $(selector).get(0);
		if (!element) continue;

		const text = textLines(element).join("\n");
		if (text.length > SCRAPE_CONFIG.minBodyLength) return text;
	}

	const body = $("body").get(0);
	if (!body) return "";

	return textLines(body)
		.filter(
			(line) =>
				line.length > SCRAPE_CONFIG.minBodyLineLength &&
				!keywords.bodyNavigation.some((keyword) => line.includes(keyword)),
		)
		.join("\n");
}

/**
 * Fetch a policy page and extract its text.
 */
export async function fetchPolicyContent(
	url: string,
	fetcher: PageFetcher = fetchPage,
): Promise<Result<string, ContentFetchError>> {
	let html: string;
	try {
		html = await fetcher(url);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.warn({ url, err: error }, "Content fetch failed");
		return { success: false, error: { type: "fetch_failed", message, cause: error } };
	}

	const text = extractMainText(html);
	if (text.length <= SCRAPE_CONFIG.minBodyLength) {
		log.info({ url, length: text.length }, "Extracted content too short");
		return { success: false, error: { type: "too_short", length: text.length } };
	}

	log.info({ url, length: text.length }, "Fetched policy content");
	return { success: true, data: text };
}
