import type { ClassifiedSegmentGroup, DetectionRun } from "../types";
import type { ListGroupsOptions, SegmentStore } from "./segment-store";

/** In-process SegmentStore used by tests and local runs without postgres. */
export class MemorySegmentStore implements SegmentStore {
	private segments = new Map<string, unknown[]>();
	private runs: DetectionRun[] = [];
	private groups = new Map<string, ClassifiedSegmentGroup[]>();
	loadCount = 0;

	seed(datasetVersion: string, rows: unknown[]): void {
		this.segments.set(datasetVersion, [...rows]);
	}

	async loadSegments(datasetVersion: string): Promise<unknown[]> {
		this.loadCount++;
		return [...(this.segments.get(datasetVersion) ?? [])];
	}

	async findRun(
		datasetVersion: string,
		configFingerprint: string,
	): Promise<DetectionRun | null> {
		return (
			this.runs.find(
				(run) =>
					run.datasetVersion === datasetVersion &&
					run.configFingerprint === configFingerprint,
			) ?? null
		);
	}

	async getRun(runId: string): Promise<DetectionRun | null> {
		return this.runs.find((run) => run.runId === runId) ?? null;
	}

	async listRuns(limit: number): Promise<DetectionRun[]> {
		return [...this.runs]
			.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
			.slice(0, limit);
	}

	async saveRun(
		run: DetectionRun,
		groups: readonly ClassifiedSegmentGroup[],
	): Promise<void> {
		this.runs.push(run);
		this.groups.set(run.runId, [...groups]);
	}

	async listGroups(
		runId: string,
		options: ListGroupsOptions = {},
	): Promise<ClassifiedSegmentGroup[]> {
		const groups = this.groups.get(runId) ?? [];
		return options.confirmedOnly ? groups.filter((g) => g.isTimer) : [...groups];
	}
}
