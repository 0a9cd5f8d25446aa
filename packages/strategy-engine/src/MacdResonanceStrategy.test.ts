import { describe, it, expect } from "vitest";
import {
	MacdResonanceShortStrategy,
	MacdResonanceStrategy,
	isBearishBeyondThreshold,
} from "./MacdResonanceStrategy";
import type { EmaSnapshot } from "@sigflow/indicators";
import { emaSnapshot, macdSnapshot, strategyInput } from "./testInput";

const params = {
	macd1Fast: 12,
	macd1Slow: 26,
	macd1Signal: 9,
	macd2Fast: 4,
	macd2Slow: 16,
	macd2Signal: 9,
};

const golden = macdSnapshot({ goldenCross: true });
const death = macdSnapshot({ macdLine: -1, signalLine: 0, deathCross: true });
const flat = macdSnapshot();

// levels for ema4, ema16, ema48, ema96 and ema192
const trendEmas = (
	levels: [number, number, number, number, number],
	overrides: Record<number, Partial<EmaSnapshot>> = {}
): Record<string, EmaSnapshot> => {
	const emas: Record<string, EmaSnapshot> = {};
	[4, 16, 48, 96, 192].forEach((period, index) => {
		emas[`ema${period}`] = emaSnapshot(period, levels[index], overrides[period]);
	});
	return emas;
};
const BULLISH: [number, number, number, number, number] = [110, 105, 100, 95, 90];
const BEARISH: [number, number, number, number, number] = [90, 95, 100, 105, 110];

describe("MacdResonanceStrategy", () => {
	const strategy = new MacdResonanceStrategy(params);

	it("maintains both macd pairs", () => {
		expect(strategy.indicators.macd).toEqual([
			{ name: "macd1", fast: 12, slow: 26, signal: 9 },
			{ name: "macd2", fast: 4, slow: 16, signal: 9 },
		]);
		expect(strategy.indicators.ema).toEqual([4, 16, 48, 96, 192]);
	});

	it("goes long when both pairs golden-cross on the same candle", () => {
		const payload = strategy.evaluate(
			strategyInput({ macd1: golden, macd2: golden }, { open: 100, close: 99.9 })
		);

		expect(payload?.decision).toBe("LONG");
		expect(payload?.reason).toBe("macd_resonance_golden_cross");
		expect(payload?.indicators).toEqual({
			close: 99.9,
			macd1: { macdLine: 1, signalLine: 0.5, histogram: 0.5 },
			macd2: { macdLine: 1, signalLine: 0.5, histogram: 0.5 },
			ema4: null,
			ema16: null,
			ema48: null,
			ema96: null,
			ema192: null,
			trend: "mixed",
		});
	});

	it("skips the entry on a candle that closed more than 0.2% down", () => {
		const payload = strategy.evaluate(
			strategyInput({ macd1: golden, macd2: golden }, { open: 100, close: 99.7 })
		);

		expect(payload?.decision).toBe("NONE");
		expect(payload?.reason).toBe("bearish_candle_filtered");
	});

	it("needs both pairs to cross", () => {
		const payload = strategy.evaluate(
			strategyInput({ macd1: golden, macd2: flat })
		);

		expect(payload?.decision).toBe("NONE");
		expect(payload?.reason).toBe("no_signal");
	});

	it("exits on a macd2 death cross", () => {
		const payload = strategy.evaluate(
			strategyInput({ macd1: flat, macd2: death })
		);

		expect(payload?.decision).toBe("EXIT");
		expect(payload?.reason).toBe("macd2_death_cross");
	});

	it("skips the entry when the candle crosses above every trend ema", () => {
		const crossed = { priceCrossAbove: true };
		const emas = trendEmas([99, 99.5, 99.8, 99.9, 99.95], {
			4: crossed,
			16: crossed,
			48: crossed,
			96: crossed,
			192: crossed,
		});

		const payload = strategy.evaluate(
			strategyInput({ macd1: golden, macd2: golden }, {}, emas)
		);

		expect(payload?.decision).toBe("NONE");
		expect(payload?.reason).toBe("crossed_all_emas_filtered");
	});

	it("still enters when only some trend emas are crossed", () => {
		const emas = trendEmas([99, 99.5, 99.8, 101, 102], {
			4: { priceCrossAbove: true },
			16: { priceCrossAbove: true },
		});

		const payload = strategy.evaluate(
			strategyInput({ macd1: golden, macd2: golden }, {}, emas)
		);

		expect(payload?.decision).toBe("LONG");
	});

	it("exits when price breaks ema48 out of a bullish pure trend", () => {
		const emas = trendEmas(BULLISH, { 48: { priceCrossBelow: true } });

		const payload = strategy.evaluate(
			strategyInput({ macd1: flat, macd2: flat }, { close: 99 }, emas)
		);

		expect(payload?.decision).toBe("EXIT");
		expect(payload?.reason).toBe("bullish_trend_broken");
		expect(payload?.indicators).toEqual({
			close: 99,
			macd1: { macdLine: 1, signalLine: 0.5, histogram: 0.5 },
			macd2: { macdLine: 1, signalLine: 0.5, histogram: 0.5 },
			ema4: 110,
			ema16: 105,
			ema48: 100,
			ema96: 95,
			ema192: 90,
			trend: "bullish_pure",
		});
	});

	it("exits when price breaks ema16 out of a bearish pure trend", () => {
		const emas = trendEmas(BEARISH, { 16: { priceCrossBelow: true } });

		const payload = strategy.evaluate(
			strategyInput({ macd1: flat, macd2: flat }, { close: 94 }, emas)
		);

		expect(payload?.decision).toBe("EXIT");
		expect(payload?.reason).toBe("bearish_trend_broken");
	});

	it("judges the trend break against the previous candle's emas", () => {
		// previously mixed, only now bullish pure
		const emas = trendEmas(BULLISH, { 48: { priceCrossBelow: true, previous: 120 } });

		const payload = strategy.evaluate(
			strategyInput({ macd1: flat, macd2: flat }, { close: 99 }, emas)
		);

		expect(payload?.decision).toBe("NONE");
		expect(payload?.reason).toBe("no_signal");
		expect(payload?.indicators.trend).toBe("bullish_pure");
	});

	it("ignores a bearish-trend ema48 break", () => {
		const emas = trendEmas(BEARISH, { 48: { priceCrossBelow: true } });

		const payload = strategy.evaluate(
			strategyInput({ macd1: flat, macd2: flat }, { close: 94 }, emas)
		);

		expect(payload?.reason).toBe("no_signal");
	});

	it("returns null until both pairs are available", () => {
		expect(strategy.evaluate(strategyInput({ macd1: golden }))).toBeNull();
	});
});

describe("MacdResonanceShortStrategy", () => {
	const strategy = new MacdResonanceShortStrategy({
		...params,
		macd2Slow: 20,
		macd2Signal: 4,
	});

	it("goes short when both pairs death-cross on the same candle", () => {
		const payload = strategy.evaluate(strategyInput({ macd1: death, macd2: death }));

		expect(payload?.decision).toBe("SHORT");
		expect(payload?.reason).toBe("macd_resonance_death_cross");
		expect(payload?.params).toEqual({
			macd1Fast: 12,
			macd1Slow: 26,
			macd1Signal: 9,
			macd2Fast: 4,
			macd2Slow: 20,
			macd2Signal: 4,
		});
	});

	it("exits on a macd2 golden cross", () => {
		const payload = strategy.evaluate(
			strategyInput({ macd1: macdSnapshot(), macd2: golden })
		);

		expect(payload?.decision).toBe("EXIT");
	});
});

describe("isBearishBeyondThreshold", () => {
	const kline = strategyInput({}).kline;

	it("ignores bullish and mildly bearish candles", () => {
		expect(isBearishBeyondThreshold({ ...kline, open: 100, close: 101 })).toBe(false);
		expect(isBearishBeyondThreshold({ ...kline, open: 100, close: 99.9 })).toBe(false);
	});

	it("flags candles that closed more than 0.2% below their open", () => {
		expect(isBearishBeyondThreshold({ ...kline, open: 100, close: 99.5 })).toBe(true);
	});
});
