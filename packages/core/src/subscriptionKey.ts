import { ValidationError } from "./errors";
import { normalizeInterval } from "./time";
import type { ParsedSubscriptionKey, SubscriptionKey } from "./types";

export const DEFAULT_EXCHANGE = "BINANCE";

const KEY_PATTERN = /^([A-Z0-9_]+):([^@:\s]+)@KLINE_([0-9]*[DWM]?)$/;
const EXCHANGE_PATTERN = /^[A-Z0-9_]+$/;
const SYMBOL_PATTERN = /^[A-Z0-9_.\-/]+$/;

const normalizeSegment = (
	value: string,
	field: "exchange" | "symbol",
	pattern: RegExp
): string => {
	const normalized = value.trim().toUpperCase();
	if (!normalized || !pattern.test(normalized)) {
		throw new ValidationError(`Invalid ${field}: "${value}"`, { field, value });
	}
	return normalized;
};

/**
 * Build the subscription key for a symbol/interval pair.
 *
 * The symbol may carry its own exchange prefix ("BINANCE:BTCUSDT"); otherwise
 * `exchange` is used. Intervals are stored as TradingView resolutions.
 * @example buildSubscriptionKey("btcusdt", "1h") => "BINANCE:BTCUSDT@KLINE_60"
 */
export const buildSubscriptionKey = (
	symbol: string,
	interval: string,
	exchange: string = DEFAULT_EXCHANGE
): SubscriptionKey => {
	if (typeof symbol !== "string" || !symbol.trim()) {
		throw new ValidationError("Symbol is required", { field: "symbol" });
	}
	const separator = symbol.indexOf(":");
	const rawExchange = separator === -1 ? exchange : symbol.slice(0, separator);
	const rawSymbol = separator === -1 ? symbol : symbol.slice(separator + 1);
	return `${normalizeSegment(
		rawExchange,
		"exchange",
		EXCHANGE_PATTERN
	)}:${normalizeSegment(rawSymbol, "symbol", SYMBOL_PATTERN)}@KLINE_${normalizeInterval(interval)}`;
};

export const parseSubscriptionKey = (
	key: SubscriptionKey
): ParsedSubscriptionKey => {
	const match = typeof key === "string" ? key.match(KEY_PATTERN) : null;
	if (!match || !match[3]) {
		throw new ValidationError(`Malformed subscription key: "${key}"`, {
			subscriptionKey: key,
		});
	}
	return {
		exchange: match[1],
		symbol: match[2],
		dataType: "KLINE",
		interval: match[3],
	};
};

export const isSubscriptionKey = (value: unknown): value is SubscriptionKey =>
	typeof value === "string" && KEY_PATTERN.test(value);
