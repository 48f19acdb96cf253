/**
 * Keyword heuristics that fill in policy metadata from a title.
 *
 * Rules are checked in order; the first match wins.
 */

import keywords from "./keywords.json";

interface KeywordRule {
	label: string;
	keywords: string[];
}

function firstMatch(rules: KeywordRule[], matches: (keyword: string) => boolean): string | null {
	const rule = rules.find((r) => r.keywords.some(matches));
	return rule ? rule.label : null;
}

export function classifyPolicyType(title: string): string {
	return firstMatch(keywords.policyTypes, (k) => title.includes(k)) ?? "其他政策";
}

/**
 * Issuing department, matched against the title or the lowercased URL.
 */
export function extractDepartment(title: string, url: string): string {
	const lowerUrl = url.toLowerCase();
	return (
		firstMatch(keywords.departments, (k) => title.includes(k) || lowerUrl.includes(k)) ??
		"未知部门"
	);
}

export function determinePolicyLevel(title: string): string {
	const { national, local } = keywords.policyLevels;
	if (national.some((k) => title.includes(k))) return "国家级";
	if (local.some((k) => title.includes(k))) return "地方级";
	return "部委级";
}

export function assessImpactLevel(title: string): string {
	const { high, medium } = keywords.impactLevels;
	if (high.some((k) => title.includes(k))) return "高";
	if (medium.some((k) => title.includes(k))) return "中";
	return "低";
}

/**
 * Regulatory category for CSRC releases (title only, case-insensitive).
 */
export function classifyCsrcPolicyType(title: string): string {
	const lower = title.toLowerCase();
	return firstMatch(keywords.csrcTypes, (k) => lower.includes(k)) ?? "证券监管";
}

/**
 * Finance ministry pages mix policy releases with news and notices about
 * the ministry itself. Exclusions win over inclusions.
 */
export function isFinancePolicyContent(title: string, url: string): boolean {
	const { include, exclude, urlPatterns } = keywords.financePolicy;

	if (exclude.some((k) => title.includes(k))) return false;
	if (include.some((k) => title.includes(k))) return true;

	const lowerUrl = url.toLowerCase();
	return urlPatterns.some((pattern) => lowerUrl.includes(pattern));
}
