import { describe, expect, it } from "vitest";
import type { ClassifiedSegmentGroup } from "../types";
import { ReportService } from "./report-service";

function group(
	overrides: Partial<ClassifiedSegmentGroup>,
): ClassifiedSegmentGroup {
	return {
		key: { visitId: 1, top: 10, left: 20, innerProcessed: "Ends in *:*" },
		siteUrl: "https://a.example/",
		observationCount: 6,
		nodeIdCount: 1,
		timestampsDistinctSecondsCount: 6,
		digitSequence: ["0010", "0009"],
		firstSeen: new Date("2024-05-01T10:00:00.000Z"),
		lastSeen: new Date("2024-05-01T10:00:05.000Z"),
		isDecreasing: true,
		isDecreasingByMode: true,
		passesTimestampGate: true,
		isTimer: true,
		...overrides,
	};
}

describe("ReportService", () => {
	const report = new ReportService();

	it("lists distinct confirmed site urls in sorted order", () => {
		const urls = report.confirmedSiteUrls([
			group({ siteUrl: "https://c.example/" }),
			group({ siteUrl: "https://a.example/" }),
			group({ siteUrl: "https://c.example/" }),
			group({ siteUrl: "https://b.example/", isTimer: false }),
		]);

		expect(urls).toEqual(["https://a.example/", "https://c.example/"]);
	});

	it("summarizes heuristic outcomes", () => {
		const summary = report.summarize([
			group({}),
			group({
				siteUrl: "https://b.example/",
				isDecreasingByMode: false,
				isTimer: false,
			}),
			group({
				isDecreasing: false,
				passesTimestampGate: false,
				isTimer: false,
			}),
			group({
				isDecreasing: false,
				isDecreasingByMode: false,
				passesTimestampGate: false,
				isTimer: false,
			}),
		]);

		expect(summary).toEqual({
			totalGroups: 4,
			decreasingCount: 2,
			decreasingByModeCount: 2,
			timestampGateCount: 2,
			confirmedCount: 1,
			ratioOnlyCount: 1,
			modeOnlyCount: 1,
			confirmedSiteCount: 1,
		});
	});

	it("keeps only confirmed timers", () => {
		const timers = report.confirmedTimers([
			group({ siteUrl: "https://x.example/" }),
			group({ isTimer: false }),
		]);
		expect(timers.map((g) => g.siteUrl)).toEqual(["https://x.example/"]);
	});

	it("renders a tabular row", () => {
		expect(report.toGroupRow(group({}))).toEqual({
			visit_id: 1,
			top: 10,
			left: 20,
			inner_processed: "Ends in *:*",
			site_url: "https://a.example/",
			observation_count: 6,
			node_id_count: 1,
			timestamps_distinct_seconds_count: 6,
			digit_sequence: ["0010", "0009"],
			first_seen: "2024-05-01T10:00:00.000Z",
			last_seen: "2024-05-01T10:00:05.000Z",
			is_decreasing: true,
			is_decreasing_by_mode: true,
			passes_timestamp_gate: true,
			is_timer: true,
		});
	});
});
