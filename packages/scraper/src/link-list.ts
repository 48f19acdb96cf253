/**
 * Candidate extraction from HTML pages that list policies as links.
 */

import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import {
	DEFAULT_CONTENT_TYPE,
	SCRAPE_CONFIG,
	createLogger,
	extractDate,
	isInMonth,
	todayCst,
	type PolicyCandidate,
} from "@policy-pulse/shared";
import { shouldSkipContent } from "./noise-filter";
import type { ExtractOptions } from "./types";

const log = createLogger("scraper:link-list");

export type LinkMetadata = Pick<
	PolicyCandidate,
	"eventType" | "department" | "policyLevel" | "impactLevel"
>;

export interface LinkListRules {
	/** Origin used for root-relative links, e.g. "https://www.gov.cn" */
	baseUrl: string;
	describe: (title: string, url: string) => LinkMetadata;
	/** Extra per-source filter applied after the noise filter */
	accept?: (title: string, url: string) => boolean;
	contentType?: string;
}

/**
 * Resolve an href to an absolute http(s) URL, or null for anchors,
 * scripts and mail links.
 */
export function resolveLink(href: string, baseUrl: string, pageUrl?: string): string | null {
	if (href.startsWith("http://") || href.startsWith("https://")) return href;
	if (href.startsWith("/") && !href.startsWith("//")) return `${baseUrl}${href}`;
	if (!pageUrl || href.startsWith("#") || /^[a-z]+:/i.test(href)) return null;

	try {
		return new URL(href, pageUrl).toString();
	} catch (error) {
		log.debug({ href, pageUrl, err: error }, "Unresolvable link");
		return null;
	}
}

/**
 * Date of the nearest ancestor whose text contains one.
 */
function extractDateFromAncestors(
	$: cheerio.CheerioAPI,
	link: cheerio.Cheerio<AnyNode>,
): string | null {
	for (const ancestor of link.parents().toArray()) {
		const date = extractDate($(ancestor).text());
		if (date) return date;
	}
	return null;
}

/**
 * Extract policy candidates from every link on the page.
 *
 * Dates come from the href and title first, then from the nearest
 * ancestor element; when neither has one the fallback date is used.
 */
export function extractLinkCandidates(
	html: string,
	rules: LinkListRules,
	options: ExtractOptions = {},
): PolicyCandidate[] {
	const $ = cheerio.load(html);
	const candidates: PolicyCandidate[] = [];
	const seen = new Set<string>();

	$("a[href]").each((_, elem) => {
		const link = $(elem);
		const href = (link.attr("href") ?? "").trim();
		const title = link.text().replace(/\s+/g, " ").trim();

		if (shouldSkipContent(title)) return;
		if (title.length <= SCRAPE_CONFIG.minLinkTitleLength) return;

		const url = resolveLink(href, rules.baseUrl, options.pageUrl);
		if (!url) return;
		if (rules.accept && !rules.accept(title, url)) return;

		const key = `${title}\n${url}`;
		if (seen.has(key)) return;
		seen.add(key);

		let date = extractDate(href + title) ?? extractDateFromAncestors($, link);
		if (!date) {
			date = options.today ?? todayCst();
			log.warn({ title: title.slice(0, 50), date }, "No date found, using fallback date");
		}

		if (options.targetMonth && !isInMonth(date, options.targetMonth)) return;

		candidates.push({
			date,
			title,
			sourceUrl: url,
			contentType: rules.contentType ?? DEFAULT_CONTENT_TYPE,
			content: null,
			...rules.describe(title, url),
		});
	});

	return candidates;
}
