import { describe, it, expect } from "vitest";
import { classifyQuality } from "./content-quality";

describe("classifyQuality", () => {
	it("returns full for text longer than 500 characters", () => {
		expect(classifyQuality("a".repeat(501))).toBe("full");
		expect(classifyQuality("a".repeat(3000))).toBe("full");
	});

	it("maps exactly 500 characters to partial", () => {
		expect(classifyQuality("a".repeat(500))).toBe("partial");
	});

	it("returns partial between 101 and 500 characters", () => {
		expect(classifyQuality("a".repeat(101))).toBe("partial");
		expect(classifyQuality("a".repeat(250))).toBe("partial");
	});

	it("maps exactly 100 characters to title_only", () => {
		expect(classifyQuality("a".repeat(100))).toBe("title_only");
	});

	it("returns title_only for short and empty text", () => {
		expect(classifyQuality("关于开展试点的通知")).toBe("title_only");
		expect(classifyQuality("")).toBe("title_only");
	});

	it("counts Chinese characters one per character", () => {
		expect(classifyQuality("政".repeat(501))).toBe("full");
	});
});
