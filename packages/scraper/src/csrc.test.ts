import { describe, it, expect } from "vitest";
import { csrcPageUrl, extractCsrcCandidates } from "./csrc";

const page = JSON.stringify({
	data: {
		results: [
			{
				title: "关于发布《上市公司信息披露管理办法》的决定",
				content: "正文内容",
				publishedTimeStr: "2025-06-03 10:00:00",
				url: "/csrc/c101/content.shtml",
				domainMetaList: [
					{ resultList: [{ key: "section", name: "部门", value: "上市公司监管部" }] },
				],
			},
			{ title: "短标题", publishedTimeStr: "2025-06-04" },
			{
				title: "关于对某公司的行政处罚决定书内容",
				content: "",
				memo: "摘要",
				publishedTimeStr: "2025-05-20 09:00:00",
			},
			{ title: 42 },
		],
	},
});

describe("extractCsrcCandidates", () => {
	it("maps API items to candidates", () => {
		expect(extractCsrcCandidates(page)).toEqual([
			{
				date: "2025-06-03",
				title: "关于发布《上市公司信息披露管理办法》的决定",
				eventType: "上市监管",
				sourceUrl: "http://www.csrc.gov.cn/csrc/c101/content.shtml",
				department: "上市公司监管部",
				policyLevel: "国家级",
				impactLevel: "低",
				contentType: "政策",
				content: "正文内容",
			},
			{
				date: "2025-05-20",
				title: "关于对某公司的行政处罚决定书内容",
				eventType: "执法监管",
				sourceUrl: "http://www.csrc.gov.cn",
				department: "证监会",
				policyLevel: "国家级",
				impactLevel: "低",
				contentType: "政策",
				content: "摘要",
			},
		]);
	});

	it("applies the target month", () => {
		const candidates = extractCsrcCandidates(page, { targetMonth: "2025-06" });
		expect(candidates.map((c) => c.date)).toEqual(["2025-06-03"]);
	});

	it("returns nothing for an unexpected response shape", () => {
		expect(extractCsrcCandidates(JSON.stringify({ error: "busy" }))).toEqual([]);
	});

	it("throws on a body that is not JSON", () => {
		expect(() => extractCsrcCandidates("<html>maintenance</html>")).toThrow(SyntaxError);
	});

	it("builds one-based page URLs", () => {
		expect(csrcPageUrl(0)).toMatch(/&page=1$/);
		expect(csrcPageUrl(4)).toMatch(/&page=5$/);
	});
});
