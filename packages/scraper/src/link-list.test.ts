import { describe, it, expect } from "vitest";
import { extractLinkCandidates, resolveLink, type LinkListRules } from "./link-list";

const rules: LinkListRules = {
	baseUrl: "https://www.gov.cn",
	describe: () => ({
		eventType: "测试政策",
		department: null,
		policyLevel: null,
		impactLevel: null,
	}),
};

const listPage = `
<html><body>
<div class="news_box">
	<span>2025-01-01</span>
	<ul>
		<li><a href="/zhengce/content/202506/content_1.htm">国务院关于深化改革推进高质量发展的意见</a> <span>2025-06-03</span></li>
		<li><a href="https://www.gov.cn/zhengce/2025-06/05/content_2.htm">关于加强金融支持实体经济的通知要点</a></li>
		<li><a href="/index.htm">首页</a></li>
		<li><a href="javascript:void(0)">关于进一步优化营商环境的若干意见</a></li>
	</ul>
</div>
</body></html>`;

describe("resolveLink", () => {
	it("keeps absolute URLs and prefixes root-relative ones", () => {
		expect(resolveLink("https://www.gov.cn/a.htm", "https://www.gov.cn")).toBe("https://www.gov.cn/a.htm");
		expect(resolveLink("/zhengce/a.htm", "https://www.gov.cn")).toBe("https://www.gov.cn/zhengce/a.htm");
	});

	it("resolves relative links against the page URL", () => {
		expect(
			resolveLink(
				"./202506/t20250610_1.htm",
				"https://www.mof.gov.cn",
				"https://www.mof.gov.cn/zhengwuxinxi/zhengcefabu/index.htm",
			),
		).toBe("https://www.mof.gov.cn/zhengwuxinxi/zhengcefabu/202506/t20250610_1.htm");
	});

	it("drops anchors, scripts and relative links without a page URL", () => {
		expect(resolveLink("#top", "https://www.gov.cn", "https://www.gov.cn/a.htm")).toBeNull();
		expect(resolveLink("javascript:void(0)", "https://www.gov.cn", "https://www.gov.cn/a.htm")).toBeNull();
		expect(resolveLink("a.htm", "https://www.gov.cn")).toBeNull();
	});
});

describe("extractLinkCandidates", () => {
	it("extracts policy links and skips navigation", () => {
		const candidates = extractLinkCandidates(listPage, rules, { today: "2025-06-30" });

		expect(candidates).toEqual([
			{
				date: "2025-06-03",
				title: "国务院关于深化改革推进高质量发展的意见",
				sourceUrl: "https://www.gov.cn/zhengce/content/202506/content_1.htm",
				contentType: "政策",
				content: null,
				eventType: "测试政策",
				department: null,
				policyLevel: null,
				impactLevel: null,
			},
			{
				date: "2025-06-05",
				title: "关于加强金融支持实体经济的通知要点",
				sourceUrl: "https://www.gov.cn/zhengce/2025-06/05/content_2.htm",
				contentType: "政策",
				content: null,
				eventType: "测试政策",
				department: null,
				policyLevel: null,
				impactLevel: null,
			},
		]);
	});

	it("prefers the nearest ancestor date over outer ones", () => {
		const [first] = extractLinkCandidates(listPage, rules);
		expect(first.date).toBe("2025-06-03");
	});

	it("falls back to the given date when none is found", () => {
		const html = `<div><a href="/a.htm">关于促进消费扩容提质的若干措施</a></div>`;
		const candidates = extractLinkCandidates(html, rules, { today: "2025-06-30" });
		expect(candidates.map((c) => c.date)).toEqual(["2025-06-30"]);
	});

	it("keeps only the target month", () => {
		const candidates = extractLinkCandidates(listPage, rules, { targetMonth: "2025-06" });
		expect(candidates).toHaveLength(2);

		const none = extractLinkCandidates(listPage, rules, { targetMonth: "2025-05" });
		expect(none).toEqual([]);
	});

	it("drops titles of ten characters or fewer", () => {
		const html = `<a href="/a.htm">关于开展试点的通知</a><a href="/b.htm">关于开展工作试点的通知</a>`;
		const candidates = extractLinkCandidates(html, rules, { today: "2025-06-30" });
		expect(candidates.map((c) => c.title)).toEqual(["关于开展工作试点的通知"]);
	});

	it("applies the source filter and removes repeated links", () => {
		const html = `
			<a href="/a.htm">关于下达专项补助资金预算的通知</a>
			<a href="/a.htm">关于下达专项补助资金预算的通知</a>
			<a href="/b.htm">关于政府采购意向公告的汇总说明</a>`;
		const candidates = extractLinkCandidates(
			html,
			{ ...rules, accept: (title) => !title.includes("采购") },
			{ today: "2025-06-30" },
		);
		expect(candidates.map((c) => c.sourceUrl)).toEqual(["https://www.gov.cn/a.htm"]);
	});

	it("uses the describe callback for metadata", () => {
		const html = `<a href="/zhengce/a.htm">关于促进消费扩容提质的若干措施</a>`;
		const [candidate] = extractLinkCandidates(
			html,
			{
				...rules,
				contentType: "新闻",
				describe: (title, url) => ({
					eventType: title.slice(0, 2),
					department: url,
					policyLevel: "国家级",
					impactLevel: "低",
				}),
			},
			{ today: "2025-06-30" },
		);
		expect(candidate).toMatchObject({
			eventType: "关于",
			department: "https://www.gov.cn/zhengce/a.htm",
			contentType: "新闻",
		});
	});
});
