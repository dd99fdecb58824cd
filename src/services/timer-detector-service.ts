import {
	modeHeuristic,
	passesTimestampGate,
	ratioHeuristic,
} from "../algorithms";
import { groupSegments } from "../core";
import type {
	ClassifiedSegmentGroup,
	DetectorConfig,
	PreprocessedObservation,
	SegmentGroup,
} from "../types";
import { logger } from "../utils/logger";

export class TimerDetectorService {
	constructor(private readonly config: DetectorConfig) {}

	classify(group: SegmentGroup): ClassifiedSegmentGroup {
		const isDecreasing = ratioHeuristic.evaluate(
			group.digitSequence,
			this.config,
		);
		const isDecreasingByMode = modeHeuristic.evaluate(
			group.digitSequence,
			this.config,
		);
		const gate = passesTimestampGate(
			group.timestampsDistinctSecondsCount,
			this.config,
		);

		return Object.freeze({
			...group,
			isDecreasing,
			isDecreasingByMode,
			passesTimestampGate: gate,
			isTimer: isDecreasing && isDecreasingByMode && gate,
		});
	}

	detect(
		observations: readonly PreprocessedObservation[],
	): ClassifiedSegmentGroup[] {
		const groups = groupSegments(observations);
		logger.debug("Grouped segment observations", {
			observations: observations.length,
			groups: groups.length,
		});
		return groups.map((group) => this.classify(group));
	}
}
