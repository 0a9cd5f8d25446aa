import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import {
	KlineEvent,
	ParsedSubscriptionKey,
	intervalToMs,
	toExchangeInterval,
} from "@sigflow/core";
import { toCcxtSymbol } from "../marketData/symbols";
import { byOpenTime, contiguousTail } from "../pipeline/continuity";

/** Source of closed klines used to warm a subscription up. */
export interface KlineHistorySource {
	fetchClosedKlines(
		key: ParsedSubscriptionKey,
		limit: number
	): Promise<KlineEvent[]>;
}

export type OhlcvFetcher = Pick<Exchange, "fetchOHLCV">;

/** A closed row is stamped with the last millisecond of its candle. */
export const mapOhlcvToKline = (
	row: OHLCV,
	symbol: string,
	interval: string,
	isClosed: boolean
): KlineEvent => {
	const [timestamp, open, high, low, close, volume] = row;
	const openTime = Number(timestamp ?? 0);
	return {
		symbol,
		interval,
		openTime,
		eventTime: isClosed ? openTime + intervalToMs(interval) - 1 : openTime,
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
		isClosed,
	};
};

/**
 * Public OHLCV history through ccxt. The exchange's still-forming candle is
 * left out, and so is anything before a hole in the exchange's data, so the
 * klines returned are closed and contiguous.
 */
export class CcxtKlineHistory implements KlineHistorySource {
	constructor(
		private readonly exchange: OhlcvFetcher,
		private readonly clock: () => number = Date.now
	) {}

	static binance(): CcxtKlineHistory {
		return new CcxtKlineHistory(new ccxt.binance({ enableRateLimit: true }));
	}

	async fetchClosedKlines(
		key: ParsedSubscriptionKey,
		limit: number
	): Promise<KlineEvent[]> {
		if (limit <= 0) {
			return [];
		}
		const intervalMs = intervalToMs(key.interval);
		const rows = await this.exchange.fetchOHLCV(
			toCcxtSymbol(key.symbol),
			toExchangeInterval(key.interval),
			undefined,
			limit + 1
		);
		const now = this.clock();
		const closed = rows
			.map((row) => mapOhlcvToKline(row, key.symbol, key.interval, true))
			.filter((kline) => kline.openTime + intervalMs <= now)
			.sort(byOpenTime);
		return contiguousTail(closed, intervalMs).slice(-limit);
	}
}
