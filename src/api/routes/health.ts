import { Hono } from "hono";
import { DETECTOR_ALGORITHM_VERSION } from "../../services/detection-run-service";

const app = new Hono();
const SERVICE_VERSION = "1.0.0";

app.get("/", (c) => {
	return c.json({
		status: "ok",
		service: "timer-scan",
		version: SERVICE_VERSION,
		detector_version: DETECTOR_ALGORITHM_VERSION,
	});
});

app.get("/health", (c) => {
	return c.json({
		status: "healthy",
		version: SERVICE_VERSION,
		detector_version: DETECTOR_ALGORITHM_VERSION,
		timestamp: new Date().toISOString(),
	});
});

export const healthRoutes = app;
