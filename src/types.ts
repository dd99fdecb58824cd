export interface SegmentObservation {
	siteUrl: string;
	visitId: number;
	nodeId: number;
	top: number;
	left: number;
	width: number;
	height: number;
	innerText: string;
	timeStamp: Date;
}

export interface PreprocessedObservation extends SegmentObservation {
	innerProcessed: string;
	innerDigits: string;
}

export interface SegmentGroupKey {
	readonly visitId: number;
	readonly top: number;
	readonly left: number;
	readonly innerProcessed: string;
}

export interface SegmentGroup {
	readonly key: SegmentGroupKey;
	readonly siteUrl: string;
	readonly observationCount: number;
	readonly nodeIdCount: number;
	readonly timestampsDistinctSecondsCount: number;
	readonly digitSequence: readonly string[];
	readonly firstSeen: Date;
	readonly lastSeen: Date;
}

export interface ClassifiedSegmentGroup extends SegmentGroup {
	readonly isDecreasing: boolean;
	readonly isDecreasingByMode: boolean;
	readonly passesTimestampGate: boolean;
	readonly isTimer: boolean;
}

/**
 * "raw" compares negative diffs against the exclusion values as written,
 * so positive entries such as 59 never match. "negated" compares against
 * their negatives (-59, -5, -9).
 */
export type ExclusionMode = "raw" | "negated";

export interface DetectorConfig {
	minNegativeUpdates: number;
	minNegPosUpdateRatio: number;
	minDistinctValues: number;
	minModeNegativeCount: number;
	minDistinctSeconds: number;
	rolloverExclusions: readonly number[];
	exclusionMode: ExclusionMode;
}

export interface DetectionSummary {
	totalGroups: number;
	decreasingCount: number;
	decreasingByModeCount: number;
	timestampGateCount: number;
	confirmedCount: number;
	ratioOnlyCount: number;
	modeOnlyCount: number;
	confirmedSiteCount: number;
}

export interface DetectionRun {
	runId: string;
	datasetVersion: string;
	configFingerprint: string;
	segmentCount: number;
	rejectedCount: number;
	summary: DetectionSummary;
	createdAt: Date;
}
