import type { DetectorConfig } from "../types";
import { type DiffSummary, modeOf, summarizeDiffs } from "./digit-diffs";

export interface DecreaseHeuristic {
	readonly name: "ratio" | "mode";
	evaluate(sequence: readonly string[], config: DetectorConfig): boolean;
}

type CountGate = "fail" | "pass" | "undecided";

/**
 * Shared first stage of both heuristics: too few genuine decreases fails,
 * and a sequence that never goes up passes outright.
 */
export function gateOnCounts(
	summary: DiffSummary,
	config: Pick<DetectorConfig, "minNegativeUpdates">,
): CountGate {
	if (summary.nNeg < config.minNegativeUpdates) {
		return "fail";
	}
	if (summary.nPos === 0) {
		return "pass";
	}
	return "undecided";
}

export const ratioHeuristic: DecreaseHeuristic = {
	name: "ratio",
	evaluate(sequence, config) {
		const summary = summarizeDiffs(sequence, config);
		const gate = gateOnCounts(summary, config);
		if (gate !== "undecided") {
			return gate === "pass";
		}
		return summary.nNeg / summary.nPos > config.minNegPosUpdateRatio;
	},
};

export const modeHeuristic: DecreaseHeuristic = {
	name: "mode",
	evaluate(sequence, config) {
		if (new Set(sequence).size < config.minDistinctValues) {
			return false;
		}

		const summary = summarizeDiffs(sequence, config);
		const gate = gateOnCounts(summary, config);
		if (gate !== "undecided") {
			return gate === "pass";
		}

		const mode = modeOf(summary.diffs);
		if (mode === null || mode.value > 0n) {
			return false;
		}

		// Separate from the overall mode: only strictly negative diffs count here.
		const negativeMode = modeOf(summary.diffs.filter((diff) => diff < 0n));
		if (
			negativeMode === null ||
			negativeMode.count < config.minModeNegativeCount
		) {
			return false;
		}

		return summary.nNeg > summary.nPos;
	},
};

export function isDecreasing(
	sequence: readonly string[],
	config: DetectorConfig,
): boolean {
	return ratioHeuristic.evaluate(sequence, config);
}

export function isDecreasingByMode(
	sequence: readonly string[],
	config: DetectorConfig,
): boolean {
	return modeHeuristic.evaluate(sequence, config);
}

export function passesTimestampGate(
	distinctSeconds: number,
	config: Pick<DetectorConfig, "minDistinctSeconds">,
): boolean {
	return distinctSeconds >= config.minDistinctSeconds;
}
