import { describe, it, expect } from "vitest";
import { ValidationError } from "@sigflow/core";
import { parseBinanceKlineMessage } from "./binanceKline";

const kline = {
	e: "kline",
	E: 1_700_000_030_000,
	s: "BTCUSDT",
	k: {
		t: 1_700_000_000_000,
		T: 1_700_000_059_999,
		s: "BTCUSDT",
		i: "1m",
		o: "37000.10",
		c: "37010.50",
		h: "37020.00",
		l: "36990.25",
		v: "12.5",
		x: false,
	},
};

describe("parseBinanceKlineMessage", () => {
	it("maps a combined-stream message keyed by candle open time", () => {
		const event = parseBinanceKlineMessage(
			JSON.stringify({ stream: "btcusdt@kline_1m", data: kline })
		);

		expect(event).toEqual({
			symbol: "BTCUSDT",
			interval: "1m",
			open: 37000.1,
			high: 37020,
			low: 36990.25,
			close: 37010.5,
			volume: 12.5,
			openTime: 1_700_000_000_000,
			eventTime: 1_700_000_030_000,
			isClosed: false,
		});
	});

	it("accepts an already parsed raw-stream payload", () => {
		const event = parseBinanceKlineMessage({ ...kline, k: { ...kline.k, x: true } });

		expect(event?.isClosed).toBe(true);
	});

	it("ignores other event types", () => {
		expect(parseBinanceKlineMessage({ e: "trade", s: "BTCUSDT" })).toBeNull();
		expect(parseBinanceKlineMessage(JSON.stringify({ result: null, id: 1 }))).toBeNull();
	});

	it("rejects malformed kline messages", () => {
		expect(() => parseBinanceKlineMessage({ ...kline, k: { ...kline.k, o: 1 } })).toThrow(
			ValidationError
		);
		expect(() => parseBinanceKlineMessage("{not json")).toThrow(
			"Stream message is not valid JSON"
		);
	});
});
