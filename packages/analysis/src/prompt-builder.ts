/**
 * Prompt templates for market-impact classification.
 *
 * Both templates ask for one JSON object with the keys `industries`,
 * `impact_type`, `analysis_summary` and `confidence_score`.
 */

import { PROMPT_CONFIG } from "@policy-pulse/shared";

export const SYSTEM_PROMPT =
	"你是一个专业的金融政策分析师，擅长分析政策新闻对股票市场的影响。请根据政策内容分析相关的行业、板块和个股。";

export type PromptTemplate = "rich" | "sparse";

export interface PromptInput {
	title: string;
	content: string;
	eventType: string;
	sourceUrl: string | null;
}

export interface BuiltPrompt {
	template: PromptTemplate;
	prompt: string;
}

function analysisRequest(
	summaryInstruction: string,
	confidenceNote: string,
	defaultConfidence: number,
): string {
	return `请从以下几个方面进行分析：
1. 相关行业：列出可能受到影响的主要行业（最多${PROMPT_CONFIG.maxIndustries}个）
2. 影响程度：评估对股市的整体影响程度（正面/负面/中性）
3. 分析摘要：${summaryInstruction}
4. 置信度：对分析结果的置信度评分（0-1之间${confidenceNote}）

请只返回一个JSON对象，不要包含其他内容：
{
    "industries": ["行业1", "行业2"],
    "impact_type": "正面/负面/中性",
    "analysis_summary": "分析摘要",
    "confidence_score": ${defaultConfidence.toFixed(1)}
}`;
}

/**
 * Cut content to the prompt limit, marking the cut.
 */
export function truncateContent(content: string): string {
	if (content.length <= PROMPT_CONFIG.maxContentLength) return content;
	return content.slice(0, PROMPT_CONFIG.maxContentLength) + PROMPT_CONFIG.truncationMarker;
}

/**
 * Build the analysis prompt. Content longer than the rich threshold gets
 * the rich template; anything shorter is analysed from the title.
 */
export function buildAnalysisPrompt(input: PromptInput): BuiltPrompt {
	const content = input.content.trim();
	const eventType = input.eventType || "未知";

	if (content.length > PROMPT_CONFIG.richContentThreshold) {
		const prompt = `请分析以下政策对中国股市的影响：

标题：${input.title}
事件类型：${eventType}

完整内容：
${truncateContent(content)}

${analysisRequest(
	"基于完整政策内容，详细说明政策的主要影响点和逻辑",
	"",
	PROMPT_CONFIG.richDefaultConfidence,
)}`;
		return { template: "rich", prompt };
	}

	const prompt = `请分析以下政策对中国股市的影响：

标题：${input.title}
内容：${content || "无详细内容"}
事件类型：${eventType}
原文链接：${input.sourceUrl || "无"}

注意：由于缺乏详细政策内容，请基于标题进行初步分析，并在置信度评分中体现这一限制。

${analysisRequest(
	"简要说明政策的主要影响点和逻辑",
	"，由于缺乏详细内容应适当降低",
	PROMPT_CONFIG.sparseDefaultConfidence,
)}`;
	return { template: "sparse", prompt };
}
