import { describe, it, expect } from "vitest";
import { extractDate, isInMonth, isPureDate, isValidTargetMonth, todayCst } from "./dates";

describe("dates", () => {
	describe("extractDate", () => {
		it("normalizes dash and slash dates", () => {
			expect(extractDate("/zhengce/2025-06-03/content.htm")).toBe("2025-06-03");
			expect(extractDate("published 2025/6/3")).toBe("2025-06-03");
		});

		it("normalizes Chinese dates", () => {
			expect(extractDate("发布时间：2024年12月1日")).toBe("2024-12-01");
		});

		it("returns the first date when several appear", () => {
			expect(extractDate("2025-01-02 to 2025-03-04")).toBe("2025-01-02");
		});

		it("rejects impossible months and days", () => {
			expect(extractDate("2025-13-01")).toBeNull();
			expect(extractDate("2025-01-32")).toBeNull();
		});

		it("returns null when no date is present", () => {
			expect(extractDate("关于促进消费的若干措施")).toBeNull();
		});
	});

	describe("isPureDate", () => {
		it("detects strings that are only a date", () => {
			expect(isPureDate(" 2025-06-03 ")).toBe(true);
			expect(isPureDate("2025/6/3")).toBe(true);
			expect(isPureDate("2025-06-03 通知")).toBe(false);
		});
	});

	describe("todayCst", () => {
		it("shifts UTC into China Standard Time", () => {
			// 2025-01-01T20:00Z is already 2025-01-02 in UTC+8
			expect(todayCst(new Date("2025-01-01T20:00:00Z"))).toBe("2025-01-02");
			expect(todayCst(new Date("2025-01-01T10:00:00Z"))).toBe("2025-01-01");
		});
	});

	describe("month filters", () => {
		it("validates YYYY-MM months", () => {
			expect(isValidTargetMonth("2025-06")).toBe(true);
			expect(isValidTargetMonth("2025-6")).toBe(false);
			expect(isValidTargetMonth("2025-00")).toBe(false);
		});

		it("matches dates inside the month only", () => {
			expect(isInMonth("2025-06-03", "2025-06")).toBe(true);
			expect(isInMonth("2025-07-01", "2025-06")).toBe(false);
		});
	});
});
