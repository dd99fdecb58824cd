import type { ClassifiedSegmentGroup, DetectionRun } from "../types";

export interface ListGroupsOptions {
	confirmedOnly?: boolean;
}

/**
 * Boundary between the detector and wherever the segment log and detection
 * results live. Segment rows are returned in the input contract's
 * snake_case shape and validated by the caller.
 */
export interface SegmentStore {
	loadSegments(datasetVersion: string): Promise<unknown[]>;
	findRun(
		datasetVersion: string,
		configFingerprint: string,
	): Promise<DetectionRun | null>;
	getRun(runId: string): Promise<DetectionRun | null>;
	listRuns(limit: number): Promise<DetectionRun[]>;
	saveRun(
		run: DetectionRun,
		groups: readonly ClassifiedSegmentGroup[],
	): Promise<void>;
	listGroups(
		runId: string,
		options?: ListGroupsOptions,
	): Promise<ClassifiedSegmentGroup[]>;
}
