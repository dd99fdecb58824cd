import type {
	PreprocessedObservation,
	SegmentGroup,
	SegmentGroupKey,
} from "../types";
import { SegmentIndex } from "./segment-index";

export function groupKeyOf(observation: PreprocessedObservation): SegmentGroupKey {
	return {
		visitId: observation.visitId,
		top: observation.top,
		left: observation.left,
		innerProcessed: observation.innerProcessed,
	};
}

export function toWholeSecond(timeStamp: Date): number {
	return Math.floor(timeStamp.getTime() / 1000);
}

function aggregate(
	key: SegmentGroupKey,
	members: readonly PreprocessedObservation[],
): SegmentGroup {
	// Array.prototype.sort is stable, so equal timestamps keep input order.
	const ordered = [...members].sort(
		(a, b) => a.timeStamp.getTime() - b.timeStamp.getTime(),
	);

	return Object.freeze({
		key: Object.freeze({ ...key }),
		siteUrl: members[0].siteUrl,
		observationCount: members.length,
		nodeIdCount: new Set(members.map((m) => m.nodeId)).size,
		timestampsDistinctSecondsCount: new Set(
			members.map((m) => toWholeSecond(m.timeStamp)),
		).size,
		digitSequence: Object.freeze(ordered.map((m) => m.innerDigits)),
		firstSeen: ordered[0].timeStamp,
		lastSeen: ordered[ordered.length - 1].timeStamp,
	});
}

/**
 * Partitions observations into groups of repeated snapshots of the same
 * element and template. Groups come out in first-appearance order.
 */
export function groupSegments(
	observations: readonly PreprocessedObservation[],
): SegmentGroup[] {
	const index = new SegmentIndex<PreprocessedObservation>();
	for (const observation of observations) {
		index.add(groupKeyOf(observation), observation);
	}

	const groups: SegmentGroup[] = [];
	for (const [key, members] of index.entries()) {
		groups.push(aggregate(key, members));
	}
	return groups;
}
