import { ValidationError } from "./errors";
import type { KlineEvent } from "./types";

const PRICE_FIELDS = ["open", "high", "low", "close", "volume"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const requireString = (
	input: Record<string, unknown>,
	field: "symbol" | "interval"
): string => {
	const value = input[field];
	if (typeof value !== "string" || !value.trim()) {
		throw new ValidationError(`Kline event is missing "${field}"`, { field });
	}
	return value.trim();
};

const requireNumber = (input: Record<string, unknown>, field: string): number => {
	const value = input[field];
	if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
		throw new ValidationError(
			`Kline event field "${field}" must be a non-negative finite number`,
			{ field, value }
		);
	}
	return value;
};

const requireEpochMs = (input: Record<string, unknown>, field: string): number => {
	const value = requireNumber(input, field);
	if (!Number.isInteger(value)) {
		throw new ValidationError(
			`Kline event field "${field}" must be epoch milliseconds`,
			{ field, value }
		);
	}
	return value;
};

/**
 * Check an inbound value against the KlineEvent contract and return a frozen
 * copy. Throws ValidationError on the first violation.
 */
export const validateKlineEvent = (input: unknown): Readonly<KlineEvent> => {
	if (!isRecord(input)) {
		throw new ValidationError("Kline event must be an object");
	}

	const symbol = requireString(input, "symbol");
	const interval = requireString(input, "interval");
	const [open, high, low, close, volume] = PRICE_FIELDS.map((field) =>
		requireNumber(input, field)
	);
	const eventTime = requireEpochMs(input, "eventTime");
	// producers that only know the candle time send it as eventTime
	const openTime =
		input.openTime === undefined ? eventTime : requireEpochMs(input, "openTime");
	if (openTime > eventTime) {
		throw new ValidationError("Kline event openTime is after its eventTime", {
			symbol,
			openTime,
			eventTime,
		});
	}
	if (typeof input.isClosed !== "boolean") {
		throw new ValidationError('Kline event is missing "isClosed"', {
			field: "isClosed",
		});
	}
	if (high < low) {
		throw new ValidationError("Kline event high is below low", {
			symbol,
			eventTime,
			high,
			low,
		});
	}

	return Object.freeze({
		symbol,
		interval,
		open,
		high,
		low,
		close,
		volume,
		openTime,
		eventTime,
		isClosed: input.isClosed,
	});
};
