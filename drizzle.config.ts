import { defineConfig } from "drizzle-kit";
import { settings } from "./src/config/settings";

// Migrations cover only the tables this service owns plus the crawl log it reads.
export default defineConfig({
	schema: "./src/db/schema.ts",
	out: "./src/db/migrations",
	dialect: "postgresql",
	tablesFilter: ["segments", "detection_runs", "timer_groups"],
	strict: true,
	dbCredentials: {
		host: settings.postgres.host,
		port: settings.postgres.port,
		database: settings.postgres.database,
		user: settings.postgres.user,
		password: settings.postgres.password,
		ssl: false,
	},
});
