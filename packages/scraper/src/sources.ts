/**
 * Built-in policy sources.
 */

import { SCRAPE_CONFIG } from "@policy-pulse/shared";
import { CSRC_ORIGIN, csrcPageUrl, extractCsrcCandidates } from "./csrc";
import { createPageFetcher, type PageFetcher } from "./http";
import { extractLinkCandidates, type LinkListRules } from "./link-list";
import {
	assessImpactLevel,
	classifyPolicyType,
	determinePolicyLevel,
	extractDepartment,
	isFinancePolicyContent,
} from "./metadata";
import type { PolicySource } from "./types";

export const SOURCE_NAMES = ["gov_cn", "ndrc", "mof", "csrc"] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

export interface SourceOptions {
	fetchPage?: PageFetcher;
	maxPages?: number;
}

interface LinkListSourceConfig extends LinkListRules {
	name: SourceName;
	label: string;
	pageUrl: (pageIndex: number) => string;
}

/**
 * Build a source for a site that lists policies as links.
 */
export function createLinkListSource(
	config: LinkListSourceConfig,
	options: SourceOptions = {},
): PolicySource {
	const fetchPage = options.fetchPage ?? createPageFetcher(SCRAPE_CONFIG.pageTimeoutMs);

	return {
		name: config.name,
		label: config.label,
		maxPages: options.maxPages ?? SCRAPE_CONFIG.defaultMaxPages,
		pageUrl: config.pageUrl,
		fetchSourcePage: fetchPage,
		extractCandidates: (raw, extractOptions) =>
			extractLinkCandidates(raw, config, extractOptions),
	};
}

// First page is index.htm, then index_1.htm, index_2.htm, ...
function indexedPage(prefix: string, extension: string) {
	return (pageIndex: number): string =>
		pageIndex === 0 ? `${prefix}index.${extension}` : `${prefix}index_${pageIndex}.${extension}`;
}

export function createGovCnSource(options: SourceOptions = {}): PolicySource {
	return createLinkListSource(
		{
			name: "gov_cn",
			label: "State Council latest policies",
			baseUrl: "https://www.gov.cn",
			pageUrl: (pageIndex) => `https://www.gov.cn/zhengce/zuixin/home_${pageIndex}.htm`,
			describe: (title, url) => ({
				eventType: classifyPolicyType(title),
				department: extractDepartment(title, url),
				policyLevel: determinePolicyLevel(title),
				impactLevel: assessImpactLevel(title),
			}),
		},
		options,
	);
}

export function createNdrcSource(options: SourceOptions = {}): PolicySource {
	return createLinkListSource(
		{
			name: "ndrc",
			label: "NDRC orders",
			baseUrl: "https://www.ndrc.gov.cn",
			pageUrl: indexedPage("https://www.ndrc.gov.cn/xxgk/zcfb/fzggwl/", "html"),
			describe: (title) => ({
				eventType: "发改委政策",
				department: "国家发改委",
				policyLevel: "国家级",
				impactLevel: assessImpactLevel(title),
			}),
		},
		options,
	);
}

export function createMofSource(options: SourceOptions = {}): PolicySource {
	return createLinkListSource(
		{
			name: "mof",
			label: "Ministry of Finance releases",
			baseUrl: "https://www.mof.gov.cn",
			pageUrl: indexedPage("https://www.mof.gov.cn/zhengwuxinxi/zhengcefabu/", "htm"),
			accept: isFinancePolicyContent,
			describe: (title) => ({
				eventType: "财政政策",
				department: "财政部",
				policyLevel: "国家级",
				impactLevel: assessImpactLevel(title),
			}),
		},
		options,
	);
}

export function createCsrcSource(options: SourceOptions = {}): PolicySource {
	const fetchPage = options.fetchPage ?? createPageFetcher(SCRAPE_CONFIG.pageTimeoutMs);

	return {
		name: "csrc",
		label: `CSRC search API (${CSRC_ORIGIN})`,
		maxPages: options.maxPages ?? 50,
		pageUrl: csrcPageUrl,
		fetchSourcePage: fetchPage,
		extractCandidates: extractCsrcCandidates,
	};
}

const SOURCE_FACTORIES: Record<SourceName, (options?: SourceOptions) => PolicySource> = {
	gov_cn: createGovCnSource,
	ndrc: createNdrcSource,
	mof: createMofSource,
	csrc: createCsrcSource,
};

export function isSourceName(name: string): name is SourceName {
	return SOURCE_NAMES.some((sourceName) => sourceName === name);
}

/**
 * Create sources by name; all of them when no names are given.
 */
export function createSources(
	names: readonly SourceName[] = SOURCE_NAMES,
	options: SourceOptions = {},
): PolicySource[] {
	return names.map((name) => SOURCE_FACTORIES[name](options));
}
