import type { DetectorConfig } from "../types";

export interface DiffSummary {
	diffs: bigint[];
	nNeg: number;
	nPos: number;
}

const DIGITS_ONLY = /^[0-9]+$/;

/**
 * Parses a digit string as a non-negative integer of any length. Empty
 * strings and strings holding anything but ASCII digits are absent (null).
 */
export function parseDigitValue(digits: string): bigint | null {
	if (!DIGITS_ONLY.test(digits)) {
		return null;
	}
	return BigInt(digits);
}

export function computeDiffs(sequence: readonly string[]): bigint[] {
	const values: bigint[] = [];
	for (const digits of sequence) {
		const value = parseDigitValue(digits);
		if (value !== null) {
			values.push(value);
		}
	}

	const diffs: bigint[] = [];
	for (let i = 1; i < values.length; i++) {
		diffs.push(values[i] - values[i - 1]);
	}
	return diffs;
}

export function isExcludedDecrease(
	diff: bigint,
	config: Pick<DetectorConfig, "rolloverExclusions" | "exclusionMode">,
): boolean {
	return config.rolloverExclusions.some((value) =>
		config.exclusionMode === "raw"
			? diff === BigInt(value)
			: diff === -BigInt(value),
	);
}

export function summarizeDiffs(
	sequence: readonly string[],
	config: Pick<DetectorConfig, "rolloverExclusions" | "exclusionMode">,
): DiffSummary {
	const diffs = computeDiffs(sequence);
	let nNeg = 0;
	let nPos = 0;
	for (const diff of diffs) {
		if (diff < 0n && !isExcludedDecrease(diff, config)) {
			nNeg++;
		} else if (diff > 0n) {
			nPos++;
		}
	}
	return { diffs, nNeg, nPos };
}

/**
 * Most frequent value and its count. On ties the value seen first wins.
 * Returns null for an empty input.
 */
export function modeOf(
	values: readonly bigint[],
): { value: bigint; count: number } | null {
	const counts = new Map<bigint, number>();
	for (const value of values) {
		counts.set(value, (counts.get(value) ?? 0) + 1);
	}

	let best: { value: bigint; count: number } | null = null;
	for (const [value, count] of counts) {
		if (best === null || count > best.count) {
			best = { value, count };
		}
	}
	return best;
}
