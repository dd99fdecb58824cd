import type { ClassifiedSegmentGroup, DetectionSummary } from "../types";

export interface GroupRow {
	visit_id: number;
	top: number;
	left: number;
	inner_processed: string;
	site_url: string;
	observation_count: number;
	node_id_count: number;
	timestamps_distinct_seconds_count: number;
	digit_sequence: string[];
	first_seen: string;
	last_seen: string;
	is_decreasing: boolean;
	is_decreasing_by_mode: boolean;
	passes_timestamp_gate: boolean;
	is_timer: boolean;
}

export class ReportService {
	confirmedTimers(
		groups: readonly ClassifiedSegmentGroup[],
	): ClassifiedSegmentGroup[] {
		return groups.filter((group) => group.isTimer);
	}

	confirmedSiteUrls(groups: readonly ClassifiedSegmentGroup[]): string[] {
		const urls = new Set(this.confirmedTimers(groups).map((g) => g.siteUrl));
		return [...urls].sort();
	}

	summarize(groups: readonly ClassifiedSegmentGroup[]): DetectionSummary {
		let decreasingCount = 0;
		let decreasingByModeCount = 0;
		let timestampGateCount = 0;
		let confirmedCount = 0;
		let ratioOnlyCount = 0;
		let modeOnlyCount = 0;

		for (const group of groups) {
			if (group.isDecreasing) decreasingCount++;
			if (group.isDecreasingByMode) decreasingByModeCount++;
			if (group.passesTimestampGate) timestampGateCount++;
			if (group.isTimer) confirmedCount++;
			if (group.isDecreasing && !group.isDecreasingByMode) ratioOnlyCount++;
			if (!group.isDecreasing && group.isDecreasingByMode) modeOnlyCount++;
		}

		return {
			totalGroups: groups.length,
			decreasingCount,
			decreasingByModeCount,
			timestampGateCount,
			confirmedCount,
			ratioOnlyCount,
			modeOnlyCount,
			confirmedSiteCount: this.confirmedSiteUrls(groups).length,
		};
	}

	toGroupRow(group: ClassifiedSegmentGroup): GroupRow {
		return {
			visit_id: group.key.visitId,
			top: group.key.top,
			left: group.key.left,
			inner_processed: group.key.innerProcessed,
			site_url: group.siteUrl,
			observation_count: group.observationCount,
			node_id_count: group.nodeIdCount,
			timestamps_distinct_seconds_count: group.timestampsDistinctSecondsCount,
			digit_sequence: [...group.digitSequence],
			first_seen: group.firstSeen.toISOString(),
			last_seen: group.lastSeen.toISOString(),
			is_decreasing: group.isDecreasing,
			is_decreasing_by_mode: group.isDecreasingByMode,
			passes_timestamp_gate: group.passesTimestampGate,
			is_timer: group.isTimer,
		};
	}
}
