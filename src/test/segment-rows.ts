const BASE_MS = Date.parse("2024-05-01T10:00:00Z");

export interface RowOptions {
	siteUrl?: string;
	visitId?: number;
	top?: number;
	startMs?: number;
}

/** Contract rows for a countdown ticking once per second. */
export function countdownRows(from: number, ticks: number, options: RowOptions = {}) {
	return Array.from({ length: ticks }, (_, i) => {
		const seconds = String(from - i).padStart(2, "0");
		return {
			site_url: options.siteUrl ?? "https://shop.example/",
			visit_id: options.visitId ?? 1,
			node_id: 30,
			top: options.top ?? 64,
			left: 12,
			width: 90,
			height: 14,
			inner_text: `Hurry! 00:${seconds}`,
			time_stamp: new Date(
				BASE_MS + (options.startMs ?? 0) + i * 1000,
			).toISOString(),
		};
	});
}

/** Contract rows for a counter that only goes up. */
export function counterRows(ticks: number, options: RowOptions = {}) {
	return Array.from({ length: ticks }, (_, i) => ({
		site_url: options.siteUrl ?? "https://news.example/",
		visit_id: options.visitId ?? 2,
		node_id: 5,
		top: options.top ?? 300,
		left: 0,
		width: 60,
		height: 14,
		inner_text: `${i + 1} readers`,
		time_stamp: new Date(BASE_MS + i * 1000).toISOString(),
	}));
}
