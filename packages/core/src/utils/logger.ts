export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			const json = JSON.stringify(sanitize(base));
			console.log(json);
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

/**
 * Logger that drops everything. Handy as a default for components that take
 * an optional logger.
 */
export const silentLogger: ModuleLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

const sanitize = (payload: BaseLogPayload): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clean = sanitizeValue(payload, seen);
	return isRecord(clean) ? clean : { value: clean };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (isRecord(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "signal_emitted": {
				printSignal(rest);
				break;
			}
			case "evaluation_failed":
			case "delivery_failed": {
				printFailure(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const fmtValue = (value: unknown): string =>
	value === undefined || value === null ? "-" : String(value);

const printSignal = (rest: Record<string, unknown>): void => {
	const close = rest.close;
	console.log(
		[
			fmtValue(rest.subscriptionKey),
			fmtValue(rest.strategyType),
			`trigger=${fmtValue(rest.triggerReason)}`,
			`decision=${fmtValue(rest.decision)}`,
			`close=${typeof close === "number" ? close.toFixed(4) : "n/a"}`,
			fmtValue(rest.reason),
		].join(" | ")
	);
};

const printFailure = (rest: Record<string, unknown>): void => {
	console.log(
		`  ${fmtValue(rest.code)} ${fmtValue(rest.subscriptionKey)} ${fmtValue(
			rest.strategyType
		)}: ${fmtValue(rest.message)}`
	);
};
