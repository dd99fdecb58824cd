export {
	type AnalysisResult,
	configFingerprint,
	DETECTOR_ALGORITHM_VERSION,
	DetectionRunService,
	type RunResult,
} from "./detection-run-service";
export {
	normalizeSegment,
	normalizeSegments,
	SegmentRowSchema,
	SegmentValidationError,
} from "./ingestion-helpers";
export { PreprocessorService, preprocessObservation } from "./preprocessor-service";
export { type GroupRow, ReportService } from "./report-service";
export { TimerDetectorService } from "./timer-detector-service";
