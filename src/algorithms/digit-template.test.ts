import { describe, expect, it } from "vitest";
import { asciiDigit, collapseDigitRuns, extractDigits } from "./digit-template";

describe("collapseDigitRuns", () => {
	it("replaces each maximal digit run with one placeholder", () => {
		expect(collapseDigitRuns("Ends in 10:09")).toBe("Ends in *:*");
		expect(collapseDigitRuns("Sale 50% off, 2 days left")).toBe(
			"Sale *% off, * days left",
		);
		expect(collapseDigitRuns("12345")).toBe("*");
	});

	it("collapses digits from other scripts", () => {
		expect(collapseDigitRuns("残り ０５：０９")).toBe("残り *：*");
		expect(collapseDigitRuns("ينتهي في ٠٣:٢٩")).toBe("ينتهي في *:*");
	});

	it("leaves text without digits untouched", () => {
		expect(collapseDigitRuns("Add to cart")).toBe("Add to cart");
		expect(collapseDigitRuns("")).toBe("");
	});

	it("is idempotent on its own output", () => {
		for (const text of ["Ends in 10:09", "3 days 04:05:06", "", "x1y22z333"]) {
			const once = collapseDigitRuns(text);
			expect(collapseDigitRuns(once)).toBe(once);
		}
	});
});

describe("extractDigits", () => {
	it("keeps digit characters in their original order", () => {
		expect(extractDigits("Ends in 10:09")).toBe("1009");
		expect(extractDigits("3 days 04:05:06")).toBe("3040506");
	});

	it("maps digits from other scripts to their ASCII values", () => {
		expect(extractDigits("残り ０５：０９")).toBe("0509");
		expect(extractDigits("ينتهي في ٠٣:٢٩")).toBe("0329");
		expect(extractDigits("बचे ४५ सेकंड")).toBe("45");
	});

	it("returns an empty string when no digit is present", () => {
		expect(extractDigits("")).toBe("");
		expect(extractDigits("Sold out")).toBe("");
	});
});

describe("asciiDigit", () => {
	it("reads values in adjacent digit runs", () => {
		// Mathematical bold nine, then double-struck zero right after it
		expect(asciiDigit("\u{1D7D7}")).toBe("9");
		expect(asciiDigit("\u{1D7D8}")).toBe("0");
		expect(asciiDigit("7")).toBe("7");
	});
});
