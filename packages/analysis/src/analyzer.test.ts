import { describe, it, expect, vi } from "vitest";
import { FAILED_SENTINEL, NO_INDUSTRY_SENTINEL } from "@policy-pulse/shared";
import { PolicyAnalyzer, type AnalysisTarget, type ContentFetcher } from "./analyzer";
import type { CompletionClient, LlmResult } from "./llm-client";

const CLASSIFIED = JSON.stringify({
	industries: ["新能源汽车", "锂电池"],
	impact_type: "正面",
	analysis_summary: "利好新能源产业链",
	confidence_score: 0.8,
});

const target = (overrides: Partial<AnalysisTarget> = {}): AnalysisTarget => ({
	policyId: 1,
	title: "关于促进新能源汽车消费的通知",
	eventType: "国务院政策",
	content: null,
	sourceUrl: "https://www.gov.cn/zhengce/content/1.htm",
	...overrides,
});

function fakeLlm(result: LlmResult): CompletionClient & { prompts: string[] } {
	const prompts: string[] = [];
	return {
		prompts,
		async complete(prompt: string) {
			prompts.push(prompt);
			return result;
		},
	};
}

const replying = (text: string) => fakeLlm({ success: true, data: { text, attempts: 1 } });

const noFetch: ContentFetcher = async () => {
	throw new Error("fetch should not be called");
};

function createAnalyzer(llm: CompletionClient, fetchContent: ContentFetcher = noFetch) {
	return new PolicyAnalyzer({
		llm,
		fetchContent,
		retryOptions: { sleep: async () => {}, random: () => 0 },
	});
}

describe("PolicyAnalyzer", () => {
	it("classifies from inline content without fetching", async () => {
		const content = "新能源汽车购置补贴延续。".repeat(10);
		const llm = replying(CLASSIFIED);

		const draft = await createAnalyzer(llm).analyze(target({ content }));

		expect(draft).toEqual({
			industries: ["新能源汽车", "锂电池"],
			summary: "利好新能源产业链",
			confidenceScore: 0.8,
			impactType: "正面",
			contentQuality: "partial",
			fullContent: content,
			status: "success",
			outcome: "classified",
		});
		expect(llm.prompts[0]).toContain("完整内容：");
	});

	it("reuses cached content before fetching", async () => {
		const fetchContent = vi.fn<ContentFetcher>(noFetch);
		const draft = await createAnalyzer(replying(CLASSIFIED), fetchContent).analyze(
			target({ cachedContent: "缓存正文内容" }),
		);

		expect(fetchContent).not.toHaveBeenCalled();
		expect(draft.fullContent).toBe("缓存正文内容");
		expect(draft.contentQuality).toBe("title_only");
	});

	it("fetches the source page when no text is stored", async () => {
		const body = "正".repeat(600);
		const fetchContent = vi.fn<ContentFetcher>(async () => ({ success: true, data: body }));

		const draft = await createAnalyzer(replying(CLASSIFIED), fetchContent).analyze(target());

		expect(fetchContent).toHaveBeenCalledWith("https://www.gov.cn/zhengce/content/1.htm");
		expect(draft.contentQuality).toBe("full");
		expect(draft.fullContent).toBe(body);
	});

	it("does not refetch a page that is too short", async () => {
		const fetchContent = vi.fn<ContentFetcher>(async () => ({
			success: false,
			error: { type: "too_short", length: 40 },
		}));
		const llm = replying(CLASSIFIED);

		const draft = await createAnalyzer(llm, fetchContent).analyze(target());

		expect(fetchContent).toHaveBeenCalledTimes(1);
		expect(draft.contentQuality).toBe("title_only");
		expect(draft.fullContent).toBe("");
		expect(llm.prompts[0]).toContain("内容：无详细内容");
	});

	it("retries a failed fetch once, then analyses from the title", async () => {
		const fetchContent = vi.fn<ContentFetcher>(async () => ({
			success: false,
			error: { type: "fetch_failed", message: "HTTP 503", cause: null },
		}));

		const draft = await createAnalyzer(replying(CLASSIFIED), fetchContent).analyze(target());

		expect(fetchContent).toHaveBeenCalledTimes(2);
		expect(draft.outcome).toBe("classified");
		expect(draft.contentQuality).toBe("title_only");
	});

	it("does not fetch without a source link", async () => {
		const fetchContent = vi.fn<ContentFetcher>(noFetch);
		const llm = replying(CLASSIFIED);

		await createAnalyzer(llm, fetchContent).analyze(target({ sourceUrl: null }));

		expect(fetchContent).not.toHaveBeenCalled();
		expect(llm.prompts[0]).toContain("原文链接：无");
	});

	it("marks a response with no industries", async () => {
		const reply = JSON.stringify({ industries: [], analysis_summary: "影响有限", confidence_score: 0.4 });

		const draft = await createAnalyzer(replying(reply)).analyze(target({ content: "短" }));

		expect(draft.industries).toEqual([NO_INDUSTRY_SENTINEL]);
		expect(draft.outcome).toBe("no_industry");
		expect(draft.status).toBe("success");
		expect(draft.confidenceScore).toBe(0.4);
	});

	it("records a failed LLM call", async () => {
		const llm = fakeLlm({ success: false, error: { type: "exhausted", message: "HTTP 502", attempts: 3 } });

		const draft = await createAnalyzer(llm).analyze(target({ content: "短" }));

		expect(draft).toEqual({
			industries: [FAILED_SENTINEL],
			summary: "LLM call failed (exhausted after 3 attempt(s)): HTTP 502",
			confidenceScore: 0,
			impactType: null,
			contentQuality: "title_only",
			fullContent: "短",
			status: "failed",
			outcome: "failed",
		});
	});

	it("records an unparseable response", async () => {
		const draft = await createAnalyzer(replying("抱歉，无法分析。")).analyze(target({ content: "短" }));

		expect(draft.outcome).toBe("failed");
		expect(draft.summary).toBe("Unparseable model response: no JSON object in response");
	});

	it("turns a thrown error into a failed draft", async () => {
		const llm: CompletionClient = {
			complete: async () => {
				throw new Error("boom");
			},
		};

		const draft = await createAnalyzer(llm).analyze(target({ content: "短" }));

		expect(draft.status).toBe("failed");
		expect(draft.summary).toBe("Unexpected error: boom");
		expect(draft.fullContent).toBe("短");
	});
});
