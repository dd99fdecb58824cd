type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

function resolveLevel(value: string | undefined): LogLevel {
	switch (value) {
		case "debug":
		case "info":
		case "warn":
		case "error":
		case "silent":
			return value;
		default:
			return "info";
	}
}

const threshold = LEVEL_ORDER[resolveLevel(process.env.LOG_LEVEL)];

function enabled(level: Exclude<LogLevel, "silent">): boolean {
	return LEVEL_ORDER[level] >= threshold;
}

export const logger = {
	debug: (msg: string, meta?: object) => {
		if (!enabled("debug")) return;
		console.debug(
			JSON.stringify({
				level: "debug",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	info: (msg: string, meta?: object) => {
		if (!enabled("info")) return;
		console.log(
			JSON.stringify({
				level: "info",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	error: (msg: string, error?: unknown) => {
		if (!enabled("error")) return;
		console.error(
			JSON.stringify({
				level: "error",
				message: msg,
				error: String(error),
				timestamp: Date.now(),
			}),
		);
	},
	warn: (msg: string, meta?: object) => {
		if (!enabled("warn")) return;
		console.warn(
			JSON.stringify({
				level: "warn",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
};
