import { z } from "zod";
import type { SegmentObservation } from "../types";
import { logger } from "../utils/logger";

export const SegmentRowSchema = z.object({
	site_url: z.string().min(1),
	visit_id: z.number().int(),
	node_id: z.number().int(),
	top: z.number(),
	left: z.number(),
	width: z.number(),
	height: z.number(),
	inner_text: z.string(),
	time_stamp: z.union([z.string().min(1), z.number()]),
});

export type SegmentRow = z.infer<typeof SegmentRowSchema>;

export class SegmentValidationError extends Error {
	constructor(
		message: string,
		readonly issues: z.ZodIssue[],
	) {
		super(message);
		this.name = "SegmentValidationError";
	}
}

function parseTimeStamp(value: string | number): Date | null {
	const date = new Date(value);
	return Number.isNaN(date.getTime()) ? null : date;
}

export function normalizeSegment(raw: unknown): SegmentObservation {
	const result = SegmentRowSchema.safeParse(raw);
	if (!result.success) {
		throw new SegmentValidationError(
			"Malformed segment row",
			result.error.issues,
		);
	}

	const row = result.data;
	const timeStamp = parseTimeStamp(row.time_stamp);
	if (!timeStamp) {
		throw new SegmentValidationError("Unparseable time_stamp", [
			{
				code: z.ZodIssueCode.custom,
				path: ["time_stamp"],
				message: `Invalid timestamp: ${String(row.time_stamp)}`,
			},
		]);
	}

	return {
		siteUrl: row.site_url,
		visitId: row.visit_id,
		nodeId: row.node_id,
		top: row.top,
		left: row.left,
		width: row.width,
		height: row.height,
		innerText: row.inner_text,
		timeStamp,
	};
}

export interface NormalizedBatch {
	segments: SegmentObservation[];
	rejected: number;
}

/**
 * Validates rows one at a time. A malformed row is logged and dropped; it
 * never aborts the rest of the batch.
 */
export function normalizeSegments(rows: readonly unknown[]): NormalizedBatch {
	const segments: SegmentObservation[] = [];
	let rejected = 0;

	rows.forEach((row, index) => {
		try {
			segments.push(normalizeSegment(row));
		} catch (error) {
			if (!(error instanceof SegmentValidationError)) {
				throw error;
			}
			rejected++;
			logger.warn("Rejected segment row", {
				index,
				reason: error.message,
				issues: error.issues.map((issue) => issue.path.join(".")),
			});
		}
	});

	return { segments, rejected };
}
