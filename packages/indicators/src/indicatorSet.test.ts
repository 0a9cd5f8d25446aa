import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@sigflow/core";
import { IndicatorSet, applyKline, createIndicatorSet, snapshotIndicators } from "./indicatorSet";

const appendAll = (set: IndicatorSet, closes: number[]): IndicatorSet =>
	closes.reduce((acc, close) => applyKline(acc, close, "append"), set);

describe("IndicatorSet", () => {
	it("keeps independent entries per ema period", () => {
		const set = appendAll(createIndicatorSet({ ema: [2, 3] }), [10, 11, 12]);
		const snapshot = snapshotIndicators(set);

		expect(snapshot.samples).toBe(3);
		expect(snapshot.emas.ema3?.value).toBe(11);
		// seed 10.5, then (12 - 10.5) * 2/3 + 10.5
		expect(snapshot.emas.ema2?.value).toBeCloseTo(11.5, 10);
	});

	it("refines the open candle against the last completed state", () => {
		let set = appendAll(createIndicatorSet({ ema: [3] }), [10, 11, 12]);
		set = applyKline(set, 14, "append");
		expect(snapshotIndicators(set).emas.ema3?.value).toBe(12.5);

		set = applyKline(set, 13, "refine");
		expect(snapshotIndicators(set).emas.ema3?.value).toBe(12);
		expect(set.samples).toBe(4);
	});

	it("ends where appending only the final closes ends", () => {
		const spec = { ema: [5], macd: [{ name: "macd", fast: 3, slow: 7, signal: 3 }] };
		const closes = [5, 7, 6, 9, 8, 11, 10, 12, 15, 13, 14, 16];
		let refined = createIndicatorSet(spec);
		for (const close of closes) {
			refined = applyKline(refined, close - 3, "append");
			refined = applyKline(refined, close + 2, "refine");
			refined = applyKline(refined, close, "refine");
		}

		expect(snapshotIndicators(refined)).toEqual(
			snapshotIndicators(appendAll(createIndicatorSet(spec), closes))
		);
	});

	it("reports macd crosses for the current candle", () => {
		const spec = { macd: [{ name: "macd", fast: 3, slow: 7, signal: 3 }] };
		const decline = Array.from({ length: 20 }, (_, i) => 100 - i);
		let set = appendAll(createIndicatorSet(spec), decline);

		set = applyKline(set, 82, "append");
		expect(snapshotIndicators(set).macds.macd).toEqual({
			macdLine: -1.5,
			signalLine: -1.75,
			histogram: 0.25,
			previous: { macdLine: -2, signalLine: -2 },
			bias: "bullish",
			goldenCross: true,
			deathCross: false,
		});

		set = applyKline(set, 80, "refine");
		const refined = snapshotIndicators(set).macds.macd;
		expect(refined?.goldenCross).toBe(false);
		expect(refined?.bias).toBe("neutral");
	});

	it("tracks price crossing an ema between candles", () => {
		let set = appendAll(createIndicatorSet({ ema: [3] }), [10, 10, 10]);
		set = applyKline(set, 12, "append");

		const above = snapshotIndicators(set);
		expect(above.close).toBe(12);
		expect(above.previousClose).toBe(10);
		expect(above.emas.ema3).toEqual({
			period: 3,
			value: 11,
			available: true,
			previous: 10,
			priceCrossAbove: true,
			priceCrossBelow: false,
		});

		// (9 - 11) * 0.5 + 11
		set = applyKline(set, 9, "append");
		expect(snapshotIndicators(set).emas.ema3).toMatchObject({
			value: 10,
			previous: 11,
			priceCrossAbove: false,
			priceCrossBelow: true,
		});

		// refining back above the ema clears the cross
		set = applyKline(set, 11.5, "refine");
		expect(snapshotIndicators(set).emas.ema3?.priceCrossBelow).toBe(false);
	});

	it("reports no ema cross before a previous candle exists", () => {
		const snapshot = snapshotIndicators(appendAll(createIndicatorSet({ ema: [1] }), [5]));

		expect(snapshot.previousClose).toBeNull();
		expect(snapshot.emas.ema1).toMatchObject({
			value: 5,
			previous: null,
			priceCrossAbove: false,
		});
	});

	it("rejects duplicate macd names", () => {
		const macd = { name: "m", fast: 12, slow: 26, signal: 9 };
		expect(() => createIndicatorSet({ macd: [macd, macd] })).toThrow(ConfigurationError);
	});

	it("cannot refine before anything was appended", () => {
		expect(() => applyKline(createIndicatorSet({ ema: [3] }), 1, "refine")).toThrow(
			"Cannot refine an empty indicator set"
		);
	});
});
