import { describe, expect, it } from "vitest";
import { settings } from "../config/settings";
import { MemorySegmentStore } from "../db/memory-segment-store";
import { countdownRows, counterRows } from "../test/segment-rows";
import {
	configFingerprint,
	DetectionRunService,
} from "./detection-run-service";

function seededStore() {
	const store = new MemorySegmentStore();
	store.seed("crawl-2024-05", [
		...countdownRows(30, 8, { siteUrl: "https://shop.example/" }),
		...counterRows(8),
		{ site_url: "https://broken.example/" },
	]);
	return store;
}

describe("configFingerprint", () => {
	it("is stable for equal configurations", () => {
		expect(configFingerprint(settings.detector)).toBe(
			configFingerprint({ ...settings.detector }),
		);
	});

	it("changes with any threshold", () => {
		expect(
			configFingerprint({ ...settings.detector, minDistinctSeconds: 4 }),
		).not.toBe(configFingerprint(settings.detector));
		expect(
			configFingerprint({ ...settings.detector, exclusionMode: "negated" }),
		).not.toBe(configFingerprint(settings.detector));
	});
});

describe("DetectionRunService", () => {
	it("analyzes rows without touching the store", () => {
		const store = new MemorySegmentStore();
		const service = new DetectionRunService(store, settings.detector);

		const result = service.analyze([
			...countdownRows(20, 6),
			{ visit_id: 1 },
		]);

		expect(result.segmentCount).toBe(6);
		expect(result.rejectedCount).toBe(1);
		expect(result.summary.totalGroups).toBe(1);
		expect(result.summary.confirmedCount).toBe(1);
		expect(store.loadCount).toBe(0);
	});

	it("computes and stores a run for a dataset", async () => {
		const store = seededStore();
		const service = new DetectionRunService(store, settings.detector);

		const { run, cached } = await service.runForDataset("crawl-2024-05");

		expect(cached).toBe(false);
		expect(run.segmentCount).toBe(16);
		expect(run.rejectedCount).toBe(1);
		expect(run.summary.totalGroups).toBe(2);
		expect(run.summary.confirmedCount).toBe(1);
		expect(run.configFingerprint).toBe(configFingerprint(settings.detector));
		expect(await service.confirmedSiteUrls(run.runId)).toEqual([
			"https://shop.example/",
		]);
		expect((await service.listGroups(run.runId, false)).length).toBe(2);
		expect((await service.listGroups(run.runId, true)).length).toBe(1);
	});

	it("reuses a stored run for the same dataset and configuration", async () => {
		const store = seededStore();
		const service = new DetectionRunService(store, settings.detector);

		const first = await service.runForDataset("crawl-2024-05");
		const second = await service.runForDataset("crawl-2024-05");

		expect(second.cached).toBe(true);
		expect(second.run.runId).toBe(first.run.runId);
		expect(store.loadCount).toBe(1);
	});

	it("shares one computation between concurrent calls", async () => {
		const store = seededStore();
		const service = new DetectionRunService(store, settings.detector);

		const [first, second] = await Promise.all([
			service.runForDataset("crawl-2024-05"),
			service.runForDataset("crawl-2024-05"),
		]);

		expect(second.run.runId).toBe(first.run.runId);
		expect(store.loadCount).toBe(1);
		expect((await service.listRuns(10)).length).toBe(1);

		const later = await service.runForDataset("crawl-2024-05");
		expect(later.cached).toBe(true);
		expect(later.run.runId).toBe(first.run.runId);
	});

	it("recomputes when the configuration changes", async () => {
		const store = seededStore();
		await new DetectionRunService(store, settings.detector).runForDataset(
			"crawl-2024-05",
		);

		const strict = new DetectionRunService(store, {
			...settings.detector,
			minDistinctSeconds: 10,
		});
		const { run, cached } = await strict.runForDataset("crawl-2024-05");

		expect(cached).toBe(false);
		expect(run.summary.confirmedCount).toBe(0);
		expect(store.loadCount).toBe(2);
	});

	it("records an empty run for an unknown dataset", async () => {
		const service = new DetectionRunService(
			new MemorySegmentStore(),
			settings.detector,
		);

		const { run } = await service.runForDataset("missing");

		expect(run.segmentCount).toBe(0);
		expect(run.summary.totalGroups).toBe(0);
	});
});
