import { describe, it, expect } from "vitest";
import {
	assessImpactLevel,
	classifyCsrcPolicyType,
	classifyPolicyType,
	determinePolicyLevel,
	extractDepartment,
	isFinancePolicyContent,
} from "./metadata";

describe("metadata heuristics", () => {
	it("classifies policy type by the first matching rule", () => {
		expect(classifyPolicyType("央行下调存款准备金率")).toBe("货币政策");
		expect(classifyPolicyType("关于延续实施减税政策的公告")).toBe("财政政策");
		// 财政 comes before 经济 in rule order
		expect(classifyPolicyType("财政支持经济发展的意见")).toBe("财政政策");
		expect(classifyPolicyType("关于加快绿色低碳转型的意见")).toBe("环保政策");
		expect(classifyPolicyType("关于印发某某工作方案的通知")).toBe("其他政策");
	});

	it("extracts department from title or url", () => {
		expect(extractDepartment("国务院办公厅关于某事项的通知", "https://example.org/a")).toBe("国务院");
		expect(extractDepartment("某事项的公告", "https://www.NDRC.gov.cn/xxgk/a.html")).toBe("发改委");
		expect(extractDepartment("某事项的公告", "https://example.org/a")).toBe("未知部门");
	});

	it("determines policy level", () => {
		expect(determinePolicyLevel("全国统一大市场建设指引")).toBe("国家级");
		expect(determinePolicyLevel("某省促进就业若干措施")).toBe("地方级");
		expect(determinePolicyLevel("关于规范某项业务的通知")).toBe("部委级");
	});

	it("assesses impact level", () => {
		expect(assessImpactLevel("关于全面深化改革的决定")).toBe("高");
		expect(assessImpactLevel("关于加强数据安全管理的通知")).toBe("中");
		expect(assessImpactLevel("关于某项工作的通知")).toBe("低");
	});

	it("classifies CSRC releases case-insensitively", () => {
		expect(classifyCsrcPolicyType("首次公开发行股票注册管理办法")).toBe("上市监管");
		expect(classifyCsrcPolicyType("IPO审核问答")).toBe("上市监管");
		expect(classifyCsrcPolicyType("公开募集证券投资基金运作指引")).toBe("基金监管");
		expect(classifyCsrcPolicyType("行政处罚决定书")).toBe("执法监管");
		expect(classifyCsrcPolicyType("证券公司监督管理条例")).toBe("证券监管");
	});

	it("filters finance ministry pages", () => {
		const url = "https://www.mof.gov.cn/zhengwuxinxi/caizhengxinwen/a.htm";
		expect(isFinancePolicyContent("关于下达专项补助资金预算的通知", url)).toBe(true);
		expect(isFinancePolicyContent("2025年政府采购意向公告汇总", url)).toBe(false);
		expect(
			isFinancePolicyContent(
				"某某某某某某某某某某某",
				"https://www.mof.gov.cn/zhengwuxinxi/zhengcefabu/a.htm",
			),
		).toBe(true);
		expect(isFinancePolicyContent("某某某某某某某某某某某", url)).toBe(false);
	});
});
