import {
	bigint,
	boolean,
	doublePrecision,
	integer,
	jsonb,
	pgTable,
	serial,
	text,
	timestamp,
} from "drizzle-orm/pg-core";
import type { DetectionSummary } from "../types";

// Raw segment log written by the crawler, one row per observed text state
export const segments = pgTable("segments", {
	id: serial("id").primaryKey(),
	datasetVersion: text("dataset_version").notNull(),
	siteUrl: text("site_url").notNull(),
	visitId: bigint("visit_id", { mode: "number" }).notNull(),
	nodeId: integer("node_id").notNull(),
	top: doublePrecision("top").notNull(),
	left: doublePrecision("left").notNull(),
	width: doublePrecision("width").notNull(),
	height: doublePrecision("height").notNull(),
	innerText: text("inner_text").notNull(),
	timeStamp: text("time_stamp").notNull(),
});

export const detectionRuns = pgTable("detection_runs", {
	id: serial("id").primaryKey(),
	runId: text("run_id").notNull().unique(),
	datasetVersion: text("dataset_version").notNull(),
	configFingerprint: text("config_fingerprint").notNull(),
	segmentCount: integer("segment_count").notNull(),
	rejectedCount: integer("rejected_count").notNull(),
	summary: jsonb("summary").$type<DetectionSummary>().notNull(),
	createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const timerGroups = pgTable("timer_groups", {
	id: serial("id").primaryKey(),
	runId: text("run_id").notNull(),
	visitId: bigint("visit_id", { mode: "number" }).notNull(),
	top: doublePrecision("top").notNull(),
	left: doublePrecision("left").notNull(),
	innerProcessed: text("inner_processed").notNull(),
	siteUrl: text("site_url").notNull(),
	observationCount: integer("observation_count").notNull(),
	nodeIdCount: integer("node_id_count").notNull(),
	distinctSeconds: integer("distinct_seconds").notNull(),
	digitSequence: jsonb("digit_sequence").$type<string[]>().notNull(),
	firstSeen: timestamp("first_seen").notNull(),
	lastSeen: timestamp("last_seen").notNull(),
	isDecreasing: boolean("is_decreasing").notNull(),
	isDecreasingByMode: boolean("is_decreasing_by_mode").notNull(),
	passesTimestampGate: boolean("passes_timestamp_gate").notNull(),
	isTimer: boolean("is_timer").notNull(),
});

export type DetectionRunRow = typeof detectionRuns.$inferSelect;
export type TimerGroupRow = typeof timerGroups.$inferSelect;
export type NewTimerGroupRow = typeof timerGroups.$inferInsert;
