import { createHash } from "node:crypto";
import type { SegmentStore } from "../db/segment-store";
import type {
	ClassifiedSegmentGroup,
	DetectionRun,
	DetectionSummary,
	DetectorConfig,
} from "../types";
import { logger } from "../utils/logger";
import { normalizeSegments } from "./ingestion-helpers";
import { PreprocessorService } from "./preprocessor-service";
import { ReportService } from "./report-service";
import { TimerDetectorService } from "./timer-detector-service";

// Bump whenever grouping or classification logic changes, so stored runs
// computed by older logic stop matching.
export const DETECTOR_ALGORITHM_VERSION = "timer-detector-v2";

export function configFingerprint(config: DetectorConfig): string {
	const canonical = JSON.stringify({
		algorithm: DETECTOR_ALGORITHM_VERSION,
		minNegativeUpdates: config.minNegativeUpdates,
		minNegPosUpdateRatio: config.minNegPosUpdateRatio,
		minDistinctValues: config.minDistinctValues,
		minModeNegativeCount: config.minModeNegativeCount,
		minDistinctSeconds: config.minDistinctSeconds,
		rolloverExclusions: [...config.rolloverExclusions],
		exclusionMode: config.exclusionMode,
	});
	return createHash("sha256").update(canonical).digest("hex");
}

export interface AnalysisResult {
	segmentCount: number;
	rejectedCount: number;
	groups: ClassifiedSegmentGroup[];
	summary: DetectionSummary;
}

export interface RunResult {
	run: DetectionRun;
	cached: boolean;
}

export class DetectionRunService {
	private readonly preprocessor = new PreprocessorService();
	private readonly detector: TimerDetectorService;
	private readonly fingerprint: string;
	private readonly inFlight = new Map<string, Promise<RunResult>>();

	constructor(
		private readonly store: SegmentStore,
		private readonly config: DetectorConfig,
		private readonly reportService: ReportService = new ReportService(),
	) {
		this.detector = new TimerDetectorService(config);
		this.fingerprint = configFingerprint(config);
	}

	get configFingerprint(): string {
		return this.fingerprint;
	}

	analyze(rows: readonly unknown[]): AnalysisResult {
		const { segments, rejected } = normalizeSegments(rows);
		const groups = this.detector.detect(this.preprocessor.preprocess(segments));
		return {
			segmentCount: segments.length,
			rejectedCount: rejected,
			groups,
			summary: this.reportService.summarize(groups),
		};
	}

	/**
	 * Returns the stored run for this dataset version and configuration when
	 * one exists, otherwise computes and persists a new one. Concurrent calls
	 * for the same dataset share one computation.
	 */
	runForDataset(datasetVersion: string): Promise<RunResult> {
		const pending = this.inFlight.get(datasetVersion);
		if (pending) {
			return pending;
		}

		const run = this.resolveRun(datasetVersion).finally(() => {
			this.inFlight.delete(datasetVersion);
		});
		this.inFlight.set(datasetVersion, run);
		return run;
	}

	private async resolveRun(datasetVersion: string): Promise<RunResult> {
		const existing = await this.store.findRun(datasetVersion, this.fingerprint);
		if (existing) {
			logger.info("Reusing stored detection run", {
				runId: existing.runId,
				datasetVersion,
			});
			return { run: existing, cached: true };
		}

		const rows = await this.store.loadSegments(datasetVersion);
		const result = this.analyze(rows);
		const createdAt = new Date();
		const run: DetectionRun = {
			runId: this.deriveRunId(datasetVersion, createdAt),
			datasetVersion,
			configFingerprint: this.fingerprint,
			segmentCount: result.segmentCount,
			rejectedCount: result.rejectedCount,
			summary: result.summary,
			createdAt,
		};

		await this.store.saveRun(run, result.groups);
		logger.info("Detection run completed", {
			runId: run.runId,
			datasetVersion,
			segments: run.segmentCount,
			rejected: run.rejectedCount,
			groups: run.summary.totalGroups,
			timers: run.summary.confirmedCount,
		});
		return { run, cached: false };
	}

	async getRun(runId: string): Promise<DetectionRun | null> {
		return this.store.getRun(runId);
	}

	async listRuns(limit: number): Promise<DetectionRun[]> {
		return this.store.listRuns(limit);
	}

	async listGroups(
		runId: string,
		confirmedOnly: boolean,
	): Promise<ClassifiedSegmentGroup[]> {
		return this.store.listGroups(runId, { confirmedOnly });
	}

	async confirmedSiteUrls(runId: string): Promise<string[]> {
		const timers = await this.store.listGroups(runId, { confirmedOnly: true });
		return this.reportService.confirmedSiteUrls(timers);
	}

	private deriveRunId(datasetVersion: string, createdAt: Date): string {
		const digest = createHash("sha256")
			.update(`${datasetVersion}:${this.fingerprint}:${createdAt.getTime()}`)
			.digest("hex");
		return `run-${Math.floor(createdAt.getTime() / 1000)}-${digest.slice(0, 8)}`;
	}
}
