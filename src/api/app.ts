import { Hono } from "hono";
import type { DetectionRunService } from "../services/detection-run-service";
import type { ReportService } from "../services/report-service";
import { logger } from "../utils/logger";
import { detectionRoutes } from "./routes/detection";
import { healthRoutes } from "./routes/health";

export interface AppServices {
	detectionRunService: DetectionRunService;
	reportService: ReportService;
}

export function createApp(services: AppServices): Hono {
	const app = new Hono();

	app.onError((err, c) => {
		logger.error("Unhandled request error", err);
		return c.json({ error: "internal_error" }, 500);
	});

	app.notFound((c) => c.json({ error: "not_found" }, 404));

	// Middleware to inject services
	app.use("*", async (c, next) => {
		c.set("detectionRunService", services.detectionRunService);
		c.set("reportService", services.reportService);
		await next();
	});

	// Register routes
	app.route("/", healthRoutes);
	app.route("/detection", detectionRoutes);

	return app;
}
