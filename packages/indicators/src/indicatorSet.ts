import { ConfigurationError } from "@sigflow/core";
import {
	EmaResult,
	EmaState,
	calculateEmaLatest,
	createEmaState,
	isPriceCrossAbove,
	isPriceCrossBelow,
	toEmaResult,
} from "./ema";
import {
	MacdBias,
	MacdLinePair,
	MacdParams,
	MacdState,
	createMacdState,
	getMacdSignal,
	isDeathCross,
	isGoldenCross,
	toMacdReading,
	updateMacd,
} from "./macd";

export interface MacdSpec extends MacdParams {
	name: string;
}

/** Indicators a strategy needs maintained for its subscription. */
export interface IndicatorSpec {
	ema?: number[];
	macd?: MacdSpec[];
}

export interface IndicatorStates {
	/** Last close folded into these states */
	close: number | null;
	emas: Record<string, EmaState>;
	macds: Record<string, MacdState>;
}

/**
 * `base` is the state as of the last completed data point, `current` also
 * includes the candle being built. Appending promotes `current` to `base`.
 */
export interface IndicatorSet {
	spec: IndicatorSpec;
	samples: number;
	base: IndicatorStates;
	current: IndicatorStates;
}

export type ApplyMode = "append" | "refine";

export interface MacdSnapshot {
	macdLine: number | null;
	signalLine: number | null;
	histogram: number | null;
	previous: MacdLinePair | null;
	bias: MacdBias | null;
	goldenCross: boolean;
	deathCross: boolean;
}

export interface EmaSnapshot extends EmaResult {
	/** Value as of the previous candle */
	previous: number | null;
	priceCrossAbove: boolean;
	priceCrossBelow: boolean;
}

export interface IndicatorSnapshot {
	samples: number;
	close: number | null;
	previousClose: number | null;
	emas: Record<string, EmaSnapshot>;
	macds: Record<string, MacdSnapshot>;
}

export const emaKey = (period: number): string => `ema${period}`;

export function createIndicatorSet(spec: IndicatorSpec): IndicatorSet {
	const emas: Record<string, EmaState> = {};
	for (const period of spec.ema ?? []) {
		emas[emaKey(period)] = createEmaState(period);
	}

	const macds: Record<string, MacdState> = {};
	for (const entry of spec.macd ?? []) {
		if (entry.name in macds) {
			throw new ConfigurationError(`Duplicate MACD indicator "${entry.name}"`);
		}
		macds[entry.name] = createMacdState(entry);
	}

	const initial: IndicatorStates = { close: null, emas, macds };
	return {
		spec: {
			ema: [...(spec.ema ?? [])],
			macd: (spec.macd ?? []).map((entry) => ({ ...entry })),
		},
		samples: 0,
		base: initial,
		current: initial,
	};
}

export function applyKline(
	set: IndicatorSet,
	close: number,
	mode: ApplyMode
): IndicatorSet {
	if (mode === "refine" && set.samples === 0) {
		throw new ConfigurationError("Cannot refine an empty indicator set");
	}
	const base = mode === "append" ? set.current : set.base;
	return {
		spec: set.spec,
		samples: mode === "append" ? set.samples + 1 : set.samples,
		base,
		current: step(base, close),
	};
}

const step = (states: IndicatorStates, close: number): IndicatorStates => {
	const emas: Record<string, EmaState> = {};
	for (const [name, state] of Object.entries(states.emas)) {
		emas[name] = calculateEmaLatest(state, close)[0];
	}
	const macds: Record<string, MacdState> = {};
	for (const [name, state] of Object.entries(states.macds)) {
		macds[name] = updateMacd(state, close)[0];
	}
	return { close, emas, macds };
};

export function snapshotIndicators(set: IndicatorSet): IndicatorSnapshot {
	const { base, current } = set;
	const emas: Record<string, EmaSnapshot> = {};
	for (const [name, state] of Object.entries(current.emas)) {
		const previous = base.emas[name]?.value ?? null;
		const before = { close: base.close, ema: previous };
		const now = { close: current.close, ema: state.value };
		emas[name] = {
			...toEmaResult(state),
			previous,
			priceCrossAbove: isPriceCrossAbove(before, now),
			priceCrossBelow: isPriceCrossBelow(before, now),
		};
	}

	const macds: Record<string, MacdSnapshot> = {};
	for (const [name, state] of Object.entries(current.macds)) {
		const reading = toMacdReading(state);
		macds[name] = {
			...reading,
			bias: getMacdSignal(reading),
			goldenCross: isGoldenCross(reading),
			deathCross: isDeathCross(reading),
		};
	}

	return {
		samples: set.samples,
		close: current.close,
		previousClose: base.close,
		emas,
		macds,
	};
}
