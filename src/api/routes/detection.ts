import { Hono } from "hono";
import { z } from "zod";
import { settings } from "../../config/settings";
import type { DetectionRunService } from "../../services/detection-run-service";
import type { ReportService } from "../../services/report-service";
import type { DetectionRun, DetectionSummary } from "../../types";

const app = new Hono();

// Type definitions for Hono context
declare module "hono" {
	interface ContextVariableMap {
		detectionRunService: DetectionRunService;
		reportService: ReportService;
	}
}

// Validation schemas. Analyze rows are checked one by one later, so a
// malformed row is counted as rejected instead of failing the request.
const AnalyzeRequestSchema = z.object({
	segments: z.array(z.unknown()),
});

const RunRequestSchema = z.object({
	dataset_version: z.string().min(1),
});

function summaryJson(summary: DetectionSummary) {
	return {
		total_groups: summary.totalGroups,
		decreasing: summary.decreasingCount,
		decreasing_by_mode: summary.decreasingByModeCount,
		timestamp_gate: summary.timestampGateCount,
		confirmed: summary.confirmedCount,
		ratio_only: summary.ratioOnlyCount,
		mode_only: summary.modeOnlyCount,
		confirmed_sites: summary.confirmedSiteCount,
	};
}

function runJson(run: DetectionRun) {
	return {
		run_id: run.runId,
		dataset_version: run.datasetVersion,
		config_fingerprint: run.configFingerprint,
		segment_count: run.segmentCount,
		rejected_count: run.rejectedCount,
		summary: summaryJson(run.summary),
		created_at: run.createdAt.toISOString(),
	};
}

app.post("/analyze", async (c) => {
	const detectionRunService = c.get("detectionRunService");
	const reportService = c.get("reportService");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = AnalyzeRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const analysis = detectionRunService.analyze(result.data.segments);

	return c.json({
		segment_count: analysis.segmentCount,
		rejected_count: analysis.rejectedCount,
		summary: summaryJson(analysis.summary),
		groups: analysis.groups.map((g) => reportService.toGroupRow(g)),
		site_urls: reportService.confirmedSiteUrls(analysis.groups),
	});
});

app.post("/runs", async (c) => {
	const detectionRunService = c.get("detectionRunService");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = RunRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const { run, cached } = await detectionRunService.runForDataset(
		result.data.dataset_version,
	);

	return c.json({
		cached,
		run: runJson(run),
	});
});

app.get("/runs", async (c) => {
	const detectionRunService = c.get("detectionRunService");
	const limit = Number(
		c.req.query("limit") || String(settings.runs.defaultListLimit),
	);
	if (!Number.isInteger(limit) || limit < 1) {
		return c.json({ error: "limit must be a positive integer" }, 400);
	}

	const runs = await detectionRunService.listRuns(limit);
	return c.json({ runs: runs.map(runJson) });
});

app.get("/runs/:runId/groups", async (c) => {
	const detectionRunService = c.get("detectionRunService");
	const reportService = c.get("reportService");
	const runId = c.req.param("runId");

	const run = await detectionRunService.getRun(runId);
	if (!run) {
		return c.json({ error: "run_not_found" }, 404);
	}

	const confirmedOnly = c.req.query("confirmed") === "true";
	const groups = await detectionRunService.listGroups(runId, confirmedOnly);

	return c.json({
		run_id: runId,
		groups: groups.map((g) => reportService.toGroupRow(g)),
	});
});

app.get("/runs/:runId/urls", async (c) => {
	const detectionRunService = c.get("detectionRunService");
	const runId = c.req.param("runId");

	const run = await detectionRunService.getRun(runId);
	if (!run) {
		return c.json({ error: "run_not_found" }, 404);
	}

	const siteUrls = await detectionRunService.confirmedSiteUrls(runId);
	return c.json({
		run_id: runId,
		site_urls: siteUrls,
	});
});

export const detectionRoutes = app;
