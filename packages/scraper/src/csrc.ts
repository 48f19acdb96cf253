/**
 * CSRC search API: paginated JSON instead of HTML.
 */

import { z } from "zod";
import {
	DEFAULT_CONTENT_TYPE,
	createLogger,
	extractDate,
	isInMonth,
	todayCst,
	type PolicyCandidate,
} from "@policy-pulse/shared";
import { assessImpactLevel, classifyCsrcPolicyType } from "./metadata";
import { shouldSkipContent } from "./noise-filter";
import type { ExtractOptions } from "./types";

const log = createLogger("scraper:csrc");

export const CSRC_ORIGIN = "http://www.csrc.gov.cn";
const CSRC_SEARCH_URL = `${CSRC_ORIGIN}/searchList/a1a078ee0bc54721ab6b148884c784a8`;
const MIN_CSRC_TITLE_LENGTH = 5;

const textField = z.string().nullish();
const timeField = z.union([z.string(), z.number()]).nullish();

const csrcItemSchema = z.object({
	title: textField,
	content: textField,
	memo: textField,
	url: textField,
	publishedTimeStr: timeField,
	publishTime: timeField,
	createTime: timeField,
	domainMetaList: z
		.array(
			z.object({
				resultList: z
					.array(
						z.object({
							key: z.string().nullish(),
							name: z.string().nullish(),
							value: z.unknown(),
						}),
					)
					.nullish(),
			}),
		)
		.nullish(),
});

const csrcResponseSchema = z.object({
	data: z.object({
		results: z.array(z.unknown()),
	}),
});

export type CsrcItem = z.infer<typeof csrcItemSchema>;

export function csrcPageUrl(pageIndex: number): string {
	return `${CSRC_SEARCH_URL}?_isAgg=true&_isJson=true&_pageSize=18&_template=index&page=${pageIndex + 1}`;
}

function itemDate(item: CsrcItem): string | null {
	for (const value of [item.publishedTimeStr, item.publishTime, item.createTime]) {
		if (value === null || value === undefined) continue;
		const date = extractDate(String(value));
		if (date) return date;
	}
	return null;
}

function itemDepartment(item: CsrcItem): string {
	for (const domain of item.domainMetaList ?? []) {
		for (const entry of domain.resultList ?? []) {
			if (entry.key !== "section" && entry.name !== "部门") continue;
			if (typeof entry.value === "string" && entry.value.trim()) {
				return entry.value.trim();
			}
		}
	}
	return "证监会";
}

function itemUrl(item: CsrcItem): string {
	const url = item.url?.trim();
	if (url?.startsWith("/")) return `${CSRC_ORIGIN}${url}`;
	if (url?.startsWith("http")) return url;
	return CSRC_ORIGIN;
}

/**
 * Parse one page of the search API. A body that is not the expected shape
 * yields no candidates; individual malformed items are skipped.
 */
export function extractCsrcCandidates(
	raw: string,
	options: ExtractOptions = {},
): PolicyCandidate[] {
	const parsed = csrcResponseSchema.safeParse(JSON.parse(raw));
	if (!parsed.success) {
		log.warn({ issues: parsed.error.issues.length }, "Unexpected CSRC response shape");
		return [];
	}

	const candidates: PolicyCandidate[] = [];

	for (const rawItem of parsed.data.data.results) {
		const itemResult = csrcItemSchema.safeParse(rawItem);
		if (!itemResult.success) {
			log.warn({ issue: itemResult.error.issues[0]?.message }, "Skipping malformed CSRC item");
			continue;
		}
		const item = itemResult.data;

		const title = (item.title ?? "").trim();
		if (title.length < MIN_CSRC_TITLE_LENGTH || shouldSkipContent(title)) continue;

		let date = itemDate(item);
		if (!date) {
			date = options.today ?? todayCst();
			log.warn({ title: title.slice(0, 50), date }, "No date found, using fallback date");
		}
		if (options.targetMonth && !isInMonth(date, options.targetMonth)) continue;

		const content = (item.content ?? "").trim() || (item.memo ?? "").trim();

		candidates.push({
			date,
			title,
			eventType: classifyCsrcPolicyType(title),
			sourceUrl: itemUrl(item),
			department: itemDepartment(item),
			policyLevel: "国家级",
			impactLevel: assessImpactLevel(title),
			contentType: DEFAULT_CONTENT_TYPE,
			content: content || null,
		});
	}

	return candidates;
}
