import { ConfigurationError } from "@sigflow/core";

/**
 * Minimal recurrence state for one EMA period. `value` stays null until
 * `period` samples have been seen; the seed is their arithmetic mean.
 */
export interface EmaState {
	period: number;
	count: number;
	seedSum: number;
	value: number | null;
}

export interface EmaResult {
	period: number;
	value: number | null;
	available: boolean;
}

export function ema(values: number[], length: number): number | null {
	if (length <= 0 || values.length < length) {
		return null;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
	}

	return emaValue;
}

export function emaSeries(
	values: number[],
	length: number
): Array<number | null> {
	const series: Array<number | null> = new Array(values.length).fill(null);

	if (length <= 0 || values.length < length) {
		return series;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));
	series[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}

export function createEmaState(period: number): EmaState {
	if (!Number.isInteger(period) || period <= 0) {
		throw new ConfigurationError(`EMA period must be a positive integer`, {
			period,
		});
	}
	return { period, count: 0, seedSum: 0, value: null };
}

/**
 * O(1) EMA step: returns the next state and the reading after `close`.
 * The prior state is not mutated.
 */
export function calculateEmaLatest(
	prior: EmaState,
	close: number
): [EmaState, EmaResult] {
	const { period } = prior;
	let next: EmaState;

	if (prior.value === null) {
		const count = prior.count + 1;
		const seedSum = prior.seedSum + close;
		next = {
			period,
			count,
			seedSum,
			value: count >= period ? seedSum / period : null,
		};
	} else {
		const multiplier = 2 / (period + 1);
		next = {
			period,
			count: prior.count + 1,
			seedSum: prior.seedSum,
			value: (close - prior.value) * multiplier + prior.value,
		};
	}

	return [next, toEmaResult(next)];
}

export const toEmaResult = (state: EmaState): EmaResult => ({
	period: state.period,
	value: state.value,
	available: state.value !== null,
});

/** A close and the EMA value computed through it. */
export interface PriceEmaPoint {
	close: number | null;
	ema: number | null;
}

const bothKnown = (
	point: PriceEmaPoint
): point is { close: number; ema: number } => point.close !== null && point.ema !== null;

/** Price closed at or below the EMA on the previous candle and above it now. */
export const isPriceCrossAbove = (previous: PriceEmaPoint, current: PriceEmaPoint): boolean =>
	bothKnown(previous) &&
	bothKnown(current) &&
	previous.close <= previous.ema &&
	current.close > current.ema;

export const isPriceCrossBelow = (previous: PriceEmaPoint, current: PriceEmaPoint): boolean =>
	bothKnown(previous) &&
	bothKnown(current) &&
	previous.close >= previous.ema &&
	current.close < current.ema;

const average = (nums: number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};
