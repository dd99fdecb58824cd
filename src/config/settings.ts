export const settings = {
	detector: {
		minNegativeUpdates: 5,
		minNegPosUpdateRatio: 5,
		minDistinctValues: 5,
		minModeNegativeCount: 5,
		minDistinctSeconds: 5,
		rolloverExclusions: [59, 5, 9],
		exclusionMode: "raw",
	},
	runs: {
		defaultListLimit: 20,
	},
	server: {
		port: Number(process.env.PORT || 3000),
		host: process.env.HOST || "0.0.0.0",
	},
	postgres: {
		host: process.env.PGHOST || "localhost",
		port: Number(process.env.PGPORT || 5432),
		database: process.env.PGDATABASE || "timer_scan",
		user: process.env.PGUSER || "timer_scan",
		password: process.env.PGPASSWORD || "timer_scan",
	},
} as const;
