import { describe, expect, it } from "vitest";
import type { SegmentObservation } from "../types";
import { PreprocessorService } from "./preprocessor-service";

function segment(innerText: string): SegmentObservation {
	return {
		siteUrl: "https://shop.example/",
		visitId: 1,
		nodeId: 4,
		top: 10,
		left: 10,
		width: 50,
		height: 12,
		innerText,
		timeStamp: new Date("2024-05-01T10:00:00Z"),
	};
}

describe("PreprocessorService", () => {
	it("derives the template and digit fields", () => {
		const [result] = new PreprocessorService().preprocess([
			segment("Offer ends in 02:15:09"),
		]);

		expect(result.innerProcessed).toBe("Offer ends in *:*:*");
		expect(result.innerDigits).toBe("021509");
		expect(result.innerText).toBe("Offer ends in 02:15:09");
	});

	it("maps empty text to empty digits", () => {
		const [result] = new PreprocessorService().preprocess([segment("")]);

		expect(result.innerProcessed).toBe("");
		expect(result.innerDigits).toBe("");
	});

	it("does not mutate its input", () => {
		const input = [segment("Only 3 left")];
		const output = new PreprocessorService().preprocess(input);

		expect(output[0]).not.toBe(input[0]);
		expect("innerDigits" in input[0]).toBe(false);
	});
});
