import { and, asc, desc, eq, sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { settings } from "../config/settings";
import type { ClassifiedSegmentGroup, DetectionRun } from "../types";
import type { DetectionRunRow, NewTimerGroupRow, TimerGroupRow } from "./schema";
import * as schema from "./schema";
import type { ListGroupsOptions, SegmentStore } from "./segment-store";

const INSERT_CHUNK_SIZE = 1000;

const pool = new Pool({
	host: settings.postgres.host,
	port: settings.postgres.port,
	database: settings.postgres.database,
	user: settings.postgres.user,
	password: settings.postgres.password,
	ssl: false,
});

export const db = drizzle(pool, { schema });

export async function initializeRegistry(): Promise<void> {
	await pool.query(`
		CREATE TABLE IF NOT EXISTS segments (
			id SERIAL PRIMARY KEY,
			dataset_version TEXT NOT NULL,
			site_url TEXT NOT NULL,
			visit_id BIGINT NOT NULL,
			node_id INTEGER NOT NULL,
			"top" DOUBLE PRECISION NOT NULL,
			"left" DOUBLE PRECISION NOT NULL,
			width DOUBLE PRECISION NOT NULL,
			height DOUBLE PRECISION NOT NULL,
			inner_text TEXT NOT NULL,
			time_stamp TEXT NOT NULL
		);

		CREATE INDEX IF NOT EXISTS segments_dataset_version_idx
			ON segments (dataset_version);

		CREATE TABLE IF NOT EXISTS detection_runs (
			id SERIAL PRIMARY KEY,
			run_id TEXT NOT NULL UNIQUE,
			dataset_version TEXT NOT NULL,
			config_fingerprint TEXT NOT NULL,
			segment_count INTEGER NOT NULL,
			rejected_count INTEGER NOT NULL,
			summary JSONB NOT NULL,
			created_at TIMESTAMP NOT NULL DEFAULT NOW()
		);

		CREATE TABLE IF NOT EXISTS timer_groups (
			id SERIAL PRIMARY KEY,
			run_id TEXT NOT NULL,
			visit_id BIGINT NOT NULL,
			"top" DOUBLE PRECISION NOT NULL,
			"left" DOUBLE PRECISION NOT NULL,
			inner_processed TEXT NOT NULL,
			site_url TEXT NOT NULL,
			observation_count INTEGER NOT NULL,
			node_id_count INTEGER NOT NULL,
			distinct_seconds INTEGER NOT NULL,
			digit_sequence JSONB NOT NULL,
			first_seen TIMESTAMP NOT NULL,
			last_seen TIMESTAMP NOT NULL,
			is_decreasing BOOLEAN NOT NULL,
			is_decreasing_by_mode BOOLEAN NOT NULL,
			passes_timestamp_gate BOOLEAN NOT NULL,
			is_timer BOOLEAN NOT NULL
		);

		CREATE INDEX IF NOT EXISTS timer_groups_run_id_idx
			ON timer_groups (run_id);
	`);
}

export async function closeRegistry(): Promise<void> {
	await pool.end();
}

// Segment log functions
export async function loadSegments(datasetVersion: string) {
	const rows = await db.query.segments.findMany({
		where: and(
			eq(schema.segments.datasetVersion, datasetVersion),
			sql`${schema.segments.innerText} ~ '[[:digit:]]'`,
		),
		orderBy: [asc(schema.segments.id)],
	});

	return rows.map((row) => ({
		site_url: row.siteUrl,
		visit_id: row.visitId,
		node_id: row.nodeId,
		top: row.top,
		left: row.left,
		width: row.width,
		height: row.height,
		inner_text: row.innerText,
		time_stamp: row.timeStamp,
	}));
}

// Detection run functions
function toDetectionRun(row: DetectionRunRow): DetectionRun {
	return {
		runId: row.runId,
		datasetVersion: row.datasetVersion,
		configFingerprint: row.configFingerprint,
		segmentCount: row.segmentCount,
		rejectedCount: row.rejectedCount,
		summary: row.summary,
		createdAt: row.createdAt,
	};
}

export async function findDetectionRun(
	datasetVersion: string,
	configFingerprint: string,
): Promise<DetectionRun | null> {
	const row = await db.query.detectionRuns.findFirst({
		where: and(
			eq(schema.detectionRuns.datasetVersion, datasetVersion),
			eq(schema.detectionRuns.configFingerprint, configFingerprint),
		),
		orderBy: [desc(schema.detectionRuns.createdAt)],
	});
	return row ? toDetectionRun(row) : null;
}

export async function getDetectionRun(
	runId: string,
): Promise<DetectionRun | null> {
	const row = await db.query.detectionRuns.findFirst({
		where: eq(schema.detectionRuns.runId, runId),
	});
	return row ? toDetectionRun(row) : null;
}

export async function listDetectionRuns(
	limit: number = 20,
): Promise<DetectionRun[]> {
	const rows = await db.query.detectionRuns.findMany({
		orderBy: [desc(schema.detectionRuns.createdAt)],
		limit,
	});
	return rows.map(toDetectionRun);
}

function toTimerGroupRow(
	runId: string,
	group: ClassifiedSegmentGroup,
): NewTimerGroupRow {
	return {
		runId,
		visitId: group.key.visitId,
		top: group.key.top,
		left: group.key.left,
		innerProcessed: group.key.innerProcessed,
		siteUrl: group.siteUrl,
		observationCount: group.observationCount,
		nodeIdCount: group.nodeIdCount,
		distinctSeconds: group.timestampsDistinctSecondsCount,
		digitSequence: [...group.digitSequence],
		firstSeen: group.firstSeen,
		lastSeen: group.lastSeen,
		isDecreasing: group.isDecreasing,
		isDecreasingByMode: group.isDecreasingByMode,
		passesTimestampGate: group.passesTimestampGate,
		isTimer: group.isTimer,
	};
}

function fromTimerGroupRow(row: TimerGroupRow): ClassifiedSegmentGroup {
	return {
		key: {
			visitId: row.visitId,
			top: row.top,
			left: row.left,
			innerProcessed: row.innerProcessed,
		},
		siteUrl: row.siteUrl,
		observationCount: row.observationCount,
		nodeIdCount: row.nodeIdCount,
		timestampsDistinctSecondsCount: row.distinctSeconds,
		digitSequence: row.digitSequence,
		firstSeen: row.firstSeen,
		lastSeen: row.lastSeen,
		isDecreasing: row.isDecreasing,
		isDecreasingByMode: row.isDecreasingByMode,
		passesTimestampGate: row.passesTimestampGate,
		isTimer: row.isTimer,
	};
}

export async function saveDetectionRun(
	run: DetectionRun,
	groups: readonly ClassifiedSegmentGroup[],
): Promise<void> {
	const rows = groups.map((group) => toTimerGroupRow(run.runId, group));

	await db.transaction(async (tx) => {
		await tx.insert(schema.detectionRuns).values({
			runId: run.runId,
			datasetVersion: run.datasetVersion,
			configFingerprint: run.configFingerprint,
			segmentCount: run.segmentCount,
			rejectedCount: run.rejectedCount,
			summary: run.summary,
			createdAt: run.createdAt,
		});

		for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
			await tx
				.insert(schema.timerGroups)
				.values(rows.slice(i, i + INSERT_CHUNK_SIZE));
		}
	});
}

export async function listTimerGroups(
	runId: string,
	options: ListGroupsOptions = {},
): Promise<ClassifiedSegmentGroup[]> {
	const rows = await db.query.timerGroups.findMany({
		where: options.confirmedOnly
			? and(
					eq(schema.timerGroups.runId, runId),
					eq(schema.timerGroups.isTimer, true),
				)
			: eq(schema.timerGroups.runId, runId),
		orderBy: [asc(schema.timerGroups.id)],
	});
	return rows.map(fromTimerGroupRow);
}

export const pgSegmentStore: SegmentStore = {
	loadSegments,
	findRun: findDetectionRun,
	getRun: getDetectionRun,
	listRuns: listDetectionRuns,
	saveRun: saveDetectionRun,
	listGroups: listTimerGroups,
};
