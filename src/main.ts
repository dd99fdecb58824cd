import { serve } from "@hono/node-server";
import { createApp } from "./api/app";
import { settings } from "./config/settings";
import { closeRegistry, initializeRegistry, pgSegmentStore } from "./db/registry";
import { DetectionRunService, ReportService } from "./services";
import { logger } from "./utils/logger";

// Initialize services
const reportService = new ReportService();
const detectionRunService = new DetectionRunService(
	pgSegmentStore,
	settings.detector,
	reportService,
);

const app = createApp({ detectionRunService, reportService });

// Start server
async function startServer() {
	logger.info("Initializing timer-scan backend", {
		configFingerprint: detectionRunService.configFingerprint,
	});
	await initializeRegistry();

	const port = settings.server.port;
	const host = settings.server.host;

	logger.info("Starting server", { host, port });

	const server = serve(
		{
			fetch: app.fetch,
			port,
			hostname: host,
		},
		(info) => {
			logger.info("Server running", { address: info.address, port: info.port });
		},
	);

	const shutdown = (signal: string) => {
		logger.info("Shutting down gracefully", { signal });
		server.close();
		closeRegistry()
			.then(() => process.exit(0))
			.catch((error) => {
				logger.error("Failed to close registry", error);
				process.exit(1);
			});
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
}

// Start the server
startServer().catch((error) => {
	logger.error("Failed to start server", error);
	process.exit(1);
});

export { app, detectionRunService, reportService };
