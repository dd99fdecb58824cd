export {
	type DecreaseHeuristic,
	gateOnCounts,
	isDecreasing,
	isDecreasingByMode,
	modeHeuristic,
	passesTimestampGate,
	ratioHeuristic,
} from "./decrease-heuristics";
export {
	computeDiffs,
	type DiffSummary,
	isExcludedDecrease,
	modeOf,
	parseDigitValue,
	summarizeDiffs,
} from "./digit-diffs";
export {
	collapseDigitRuns,
	DIGIT_PLACEHOLDER,
	extractDigits,
} from "./digit-template";
