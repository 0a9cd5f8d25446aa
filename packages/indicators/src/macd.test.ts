import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@sigflow/core";
import {
	MacdReading,
	MacdState,
	createMacdState,
	getMacdSignal,
	isDeathCross,
	isGoldenCross,
	macd,
	updateMacd,
} from "./macd";

const params = { fast: 3, slow: 7, signal: 3 };

const run = (closes: number[], state: MacdState = createMacdState(params)) => {
	const readings: MacdReading[] = [];
	let next = state;
	for (const close of closes) {
		const [updated, reading] = updateMacd(next, close);
		next = updated;
		readings.push(reading);
	}
	return { state: next, readings };
};

// 100 down to 81, then 82 up to 101
const valley = [
	...Array.from({ length: 20 }, (_, i) => 100 - i),
	...Array.from({ length: 20 }, (_, i) => 82 + i),
];

describe("updateMacd", () => {
	it("reports nothing while the slow and signal averages warm up", () => {
		const { readings } = run(valley.slice(0, 9));

		expect(readings.slice(0, 6).every((r) => r.macdLine === null)).toBe(true);
		expect(readings[6]?.macdLine).toBe(-2);
		expect(readings.slice(0, 8).every((r) => getMacdSignal(r) === null)).toBe(true);
		expect(readings[8]).toEqual({
			macdLine: -2,
			signalLine: -2,
			histogram: 0,
			previous: null,
		});
	});

	it("flags a golden cross exactly once on the turn of a valley", () => {
		const { readings } = run(valley);
		const golden = readings
			.map((reading, index) => (isGoldenCross(reading) ? index : -1))
			.filter((index) => index >= 0);

		expect(golden).toEqual([20]);
		expect(readings.some((reading) => isDeathCross(reading))).toBe(false);
		expect(readings[20]).toEqual({
			macdLine: -1.5,
			signalLine: -1.75,
			histogram: 0.25,
			previous: { macdLine: -2, signalLine: -2 },
		});
		expect(getMacdSignal(readings[20])).toBe("bullish");
	});

	it("flags a death cross on the turn of a peak", () => {
		const peak = valley.map((close) => 200 - close);
		const { readings } = run(peak);

		expect(isDeathCross(readings[20])).toBe(true);
		expect(readings.filter((reading) => isDeathCross(reading))).toHaveLength(1);
		expect(readings.some((reading) => isGoldenCross(reading))).toBe(false);
	});

	it("matches the batch macd over the same closes", () => {
		const closes = Array.from({ length: 80 }, (_, i) => 50 + Math.cos(i / 6) * 4 + i * 0.05);
		const { readings } = run(closes, createMacdState({ fast: 12, slow: 26, signal: 9 }));
		const last = readings[readings.length - 1];
		const batch = macd(closes, 12, 26, 9);

		expect(last?.macdLine).toBeCloseTo(batch.macd ?? Number.NaN, 10);
		expect(last?.signalLine).toBeCloseTo(batch.signal ?? Number.NaN, 10);
		expect(last?.histogram).toBeCloseTo(batch.histogram ?? Number.NaN, 10);
	});

	it("rejects a fast period that is not shorter than the slow one", () => {
		expect(() => createMacdState({ fast: 26, slow: 12, signal: 9 })).toThrow(
			ConfigurationError
		);
	});
});

describe("cross detection", () => {
	it("treats touching lines as no cross", () => {
		const reading: MacdReading = {
			macdLine: 1,
			signalLine: 1,
			histogram: 0,
			previous: { macdLine: 0.5, signalLine: 1 },
		};

		expect(isGoldenCross(reading)).toBe(false);
		expect(getMacdSignal(reading)).toBe("neutral");
	});

	it("is false whenever the previous pair is missing", () => {
		expect(
			isGoldenCross({ macdLine: 2, signalLine: 1, histogram: 1, previous: null })
		).toBe(false);
	});
});
