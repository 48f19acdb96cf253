import { QUALITY_THRESHOLDS, type ContentQuality } from "./constants";

/**
 * Bucket available text into a content quality tier by length.
 *
 * Boundary lengths map to the lower tier: exactly 500 characters is
 * `partial`, exactly 100 is `title_only`.
 */
export function classifyQuality(text: string): ContentQuality {
	const length = text.length;
	if (length > QUALITY_THRESHOLDS.full) return "full";
	if (length > QUALITY_THRESHOLDS.partial) return "partial";
	return "title_only";
}
