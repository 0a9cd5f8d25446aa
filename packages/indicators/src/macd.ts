import { ConfigurationError } from "@sigflow/core";
import {
	EmaState,
	calculateEmaLatest,
	createEmaState,
	ema,
	emaSeries,
} from "./ema";

export interface MacdResult {
	macd: number | null;
	signal: number | null;
	histogram: number | null;
}

export interface MacdParams {
	fast: number;
	slow: number;
	signal: number;
}

export interface MacdLinePair {
	macdLine: number;
	signalLine: number;
}

/**
 * Streaming MACD state: the three EMA recurrences plus the line pair of the
 * latest data point and the one before it, which is all crossover detection
 * needs.
 */
export interface MacdState {
	params: MacdParams;
	fast: EmaState;
	slow: EmaState;
	signal: EmaState;
	previous: MacdLinePair | null;
	current: MacdLinePair | null;
}

export interface MacdReading {
	macdLine: number | null;
	signalLine: number | null;
	histogram: number | null;
	previous: MacdLinePair | null;
}

export type MacdBias = "bullish" | "bearish" | "neutral";

export function macd(
	closes: number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdResult {
	if (closes.length === 0 || slow <= 0 || fast <= 0 || signalLength <= 0) {
		return { macd: null, signal: null, histogram: null };
	}

	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);

	const macdSeries: Array<number | null> = fastSeries.map((fastValue, index) => {
		const slowValue = slowSeries[index];
		if (fastValue === null || slowValue === null) {
			return null;
		}
		return fastValue - slowValue;
	});

	const latestMacd = lastDefined(macdSeries);
	const macdValues = macdSeries.filter((value): value is number => value !== null);
	const signalValue = macdValues.length >= signalLength ? ema(macdValues, signalLength) : null;
	const histogram = latestMacd !== null && signalValue !== null ? latestMacd - signalValue : null;

	return {
		macd: latestMacd,
		signal: signalValue,
		histogram
	};
}

export function createMacdState(params: MacdParams): MacdState {
	if (params.fast >= params.slow) {
		throw new ConfigurationError(
			`MACD fast period must be shorter than slow period`,
			{ ...params }
		);
	}
	return {
		params: { ...params },
		fast: createEmaState(params.fast),
		slow: createEmaState(params.slow),
		signal: createEmaState(params.signal),
		previous: null,
		current: null,
	};
}

/**
 * O(1) MACD step. The macd line exists once both EMAs are seeded; the signal
 * EMA only consumes macd line values, so it seeds `signal` samples later.
 */
export function updateMacd(
	prior: MacdState,
	close: number
): [MacdState, MacdReading] {
	const [fast, fastResult] = calculateEmaLatest(prior.fast, close);
	const [slow, slowResult] = calculateEmaLatest(prior.slow, close);

	let signal = prior.signal;
	let macdLine: number | null = null;
	let signalLine: number | null = null;

	if (fastResult.value !== null && slowResult.value !== null) {
		macdLine = fastResult.value - slowResult.value;
		const [nextSignal, signalResult] = calculateEmaLatest(prior.signal, macdLine);
		signal = nextSignal;
		signalLine = signalResult.value;
	}

	const current =
		macdLine !== null && signalLine !== null ? { macdLine, signalLine } : null;
	const next: MacdState = {
		params: prior.params,
		fast,
		slow,
		signal,
		previous: prior.current,
		current,
	};

	return [next, toMacdReading(next, macdLine)];
}

export const toMacdReading = (
	state: MacdState,
	macdLine: number | null = state.current?.macdLine ?? macdLineOf(state)
): MacdReading => {
	const signalLine = state.current?.signalLine ?? null;
	return {
		macdLine,
		signalLine,
		histogram:
			macdLine !== null && signalLine !== null ? macdLine - signalLine : null,
		previous: state.previous,
	};
};

const macdLineOf = (state: MacdState): number | null =>
	state.fast.value !== null && state.slow.value !== null
		? state.fast.value - state.slow.value
		: null;

/** Where the macd line sits against its signal line; null while warming up. */
export function getMacdSignal(reading: MacdReading): MacdBias | null {
	const { macdLine, signalLine } = reading;
	if (macdLine === null || signalLine === null) {
		return null;
	}
	if (macdLine > signalLine) {
		return "bullish";
	}
	if (macdLine < signalLine) {
		return "bearish";
	}
	return "neutral";
}

export function isGoldenCross(reading: MacdReading): boolean {
	const { previous, macdLine, signalLine } = reading;
	if (previous === null || macdLine === null || signalLine === null) {
		return false;
	}
	return previous.macdLine <= previous.signalLine && macdLine > signalLine;
}

export function isDeathCross(reading: MacdReading): boolean {
	const { previous, macdLine, signalLine } = reading;
	if (previous === null || macdLine === null || signalLine === null) {
		return false;
	}
	return previous.macdLine >= previous.signalLine && macdLine < signalLine;
}

const lastDefined = (values: Array<number | null>): number | null => {
	for (let i = values.length - 1; i >= 0; i -= 1) {
		const value = values[i];
		if (value !== null) {
			return value;
		}
	}
	return null;
};
