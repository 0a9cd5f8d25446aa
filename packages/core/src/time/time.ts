/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */
import { ValidationError } from "../errors";
import { DAY_MS, MINUTE_MS, MONTH_MS, WEEK_MS } from "./constants";

export type IntervalUnit = "minute" | "day" | "week" | "month";

export interface ParsedInterval {
	/** TradingView resolution, e.g. "1", "60", "D", "2W" */
	resolution: string;
	unit: IntervalUnit;
	n: number;
	ms: number;
}

const RESOLUTION_PATTERN = /^(\d+)$|^(\d*)([DWM])$/;
const EXCHANGE_PATTERN = /^(\d+)([mhdwM])$/;

const ensureInterval = (interval: string): string => {
	if (typeof interval !== "string") {
		throw new ValidationError(
			`Invalid interval: expected string, got ${typeof interval}`
		);
	}
	const trimmed = interval.trim();
	if (!trimmed) {
		throw new ValidationError("Invalid interval: empty value");
	}
	return trimmed;
};

const positive = (raw: string, interval: string): number => {
	const n = raw === "" ? 1 : parseInt(raw, 10);
	if (!Number.isFinite(n) || n <= 0) {
		throw new ValidationError(
			`Invalid interval: period must be positive, got ${raw} in "${interval}"`
		);
	}
	return n;
};

const withCount = (n: number, unit: "D" | "W" | "M"): string =>
	n === 1 ? unit : `${n}${unit}`;

const MINUTES_PER_DAY = DAY_MS / MINUTE_MS;

// Whole days are written as day resolutions; exchanges take "1d", not "24h".
const fromMinutes = (n: number): string =>
	n % MINUTES_PER_DAY === 0 ? withCount(n / MINUTES_PER_DAY, "D") : String(n);

/**
 * Normalize an interval to TradingView resolution format.
 * Exchange style ("1m", "1h", "1d", "1w", "1M") and resolution style
 * ("1", "60", "D") are both accepted; "M" is month, "m" is minute.
 * @example normalizeInterval("4h") => "240"
 * @throws ValidationError if the interval cannot be parsed
 */
export const normalizeInterval = (interval: string): string => {
	const trimmed = ensureInterval(interval);

	const resolution = trimmed.match(RESOLUTION_PATTERN);
	if (resolution) {
		if (resolution[1] !== undefined) {
			return fromMinutes(positive(resolution[1], interval));
		}
		const unit = resolution[3];
		if (unit === "D" || unit === "W" || unit === "M") {
			return withCount(positive(resolution[2] ?? "", interval), unit);
		}
	}

	const exchange = trimmed.match(EXCHANGE_PATTERN);
	if (!exchange) {
		throw new ValidationError(
			`Invalid interval format: "${interval}". Expected "1m", "1h", "1d" or a resolution like "1", "60", "D"`
		);
	}
	const n = positive(exchange[1], interval);
	switch (exchange[2]) {
		case "m":
			return fromMinutes(n);
		case "h":
			return fromMinutes(n * 60);
		case "d":
			return withCount(n, "D");
		case "w":
			return withCount(n, "W");
		case "M":
			return withCount(n, "M");
		default:
			throw new ValidationError(
				`Invalid interval unit: "${exchange[2]}" in "${interval}"`
			);
	}
};

/**
 * Parse an interval (either format) into its resolution, unit and length.
 * Months are counted as 30 days.
 */
export const parseInterval = (interval: string): ParsedInterval => {
	const resolution = normalizeInterval(interval);
	const match = resolution.match(/^(\d*)([DWM]?)$/);
	if (!match) {
		throw new ValidationError(`Invalid interval: "${interval}"`);
	}
	const n = match[1] === "" ? 1 : parseInt(match[1], 10);
	switch (match[2]) {
		case "":
			return { resolution, unit: "minute", n, ms: n * MINUTE_MS };
		case "D":
			return { resolution, unit: "day", n, ms: n * DAY_MS };
		case "W":
			return { resolution, unit: "week", n, ms: n * WEEK_MS };
		default:
			return { resolution, unit: "month", n, ms: n * MONTH_MS };
	}
};

/**
 * Interval length in milliseconds
 * @example intervalToMs("60") => 3600000
 */
export const intervalToMs = (interval: string): number =>
	parseInterval(interval).ms;

/**
 * Interval in the exchange stream format ("1m", "4h", "1d", "1w", "1M")
 */
export const toExchangeInterval = (interval: string): string => {
	const { unit, n } = parseInterval(interval);
	switch (unit) {
		case "minute":
			return n % 60 === 0 ? `${n / 60}h` : `${n}m`;
		case "day":
			return `${n}d`;
		case "week":
			return `${n}w`;
		case "month":
			return `${n}M`;
	}
};

/**
 * Index of the wall-clock minute containing `ts`
 * @example minuteBucket(125_000) => 2
 */
export const minuteBucket = (ts: number): number => Math.floor(ts / MINUTE_MS);
