import type { KlineEvent } from "@sigflow/core";
import type { EmaSnapshot, MacdSnapshot } from "@sigflow/indicators";
import type { StrategyInput } from "./types";

export const macdSnapshot = (overrides: Partial<MacdSnapshot> = {}): MacdSnapshot => ({
	macdLine: 1,
	signalLine: 0.5,
	histogram: 0.5,
	previous: { macdLine: 0, signalLine: 0.5 },
	bias: "bullish",
	goldenCross: false,
	deathCross: false,
	...overrides,
});

export const emaSnapshot = (
	period: number,
	value: number,
	overrides: Partial<EmaSnapshot> = {}
): EmaSnapshot => ({
	period,
	value,
	available: true,
	previous: value,
	priceCrossAbove: false,
	priceCrossBelow: false,
	...overrides,
});

export const strategyInput = (
	macds: Record<string, MacdSnapshot>,
	kline: Partial<KlineEvent> = {},
	emas: Record<string, EmaSnapshot> = {}
): StrategyInput => ({
	symbol: "BTCUSDT",
	interval: "1m",
	kline: {
		symbol: "BTCUSDT",
		interval: "1m",
		open: 100,
		high: 101,
		low: 99,
		close: 100,
		volume: 10,
		openTime: 0,
		eventTime: 59_999,
		isClosed: true,
		...kline,
	},
	subscriptionKey: "BINANCE:BTCUSDT@KLINE_1",
	computedAt: 60_000,
	indicators: {
		samples: 40,
		close: kline.close ?? 100,
		previousClose: 100,
		emas,
		macds,
	},
});
