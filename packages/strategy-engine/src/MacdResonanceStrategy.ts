import type { KlineEvent, SignalPayload } from "@sigflow/core";
import type { IndicatorSpec } from "@sigflow/indicators";
import { z } from "zod";
import { TREND_EMA_PERIODS, emaValues, readEmaTrend } from "./emaTrend";
import { buildPayload, macdValues, readyMacd } from "./macdPayload";
import { describeParams, intParam, parseParams } from "./params";
import type { IntParamSpec, Strategy, StrategyDefinition, StrategyInput } from "./types";

const MACD1 = "macd1";
const MACD2 = "macd2";

/** Candles that closed lower than this fraction of their open are skipped. */
export const BEARISH_CANDLE_THRESHOLD = -0.002;

const resonanceParams = (macd2: {
	slow: number;
	signal: number;
}): Record<
	| "macd1Fast"
	| "macd1Slow"
	| "macd1Signal"
	| "macd2Fast"
	| "macd2Slow"
	| "macd2Signal",
	IntParamSpec
> => ({
	macd1Fast: { default: 12, min: 1, max: 100, description: "MACD1 fast EMA period" },
	macd1Slow: { default: 26, min: 1, max: 200, description: "MACD1 slow EMA period" },
	macd1Signal: { default: 9, min: 1, max: 50, description: "MACD1 signal line period" },
	macd2Fast: { default: 4, min: 1, max: 50, description: "MACD2 fast EMA period" },
	macd2Slow: { default: macd2.slow, min: 1, max: 100, description: "MACD2 slow EMA period" },
	macd2Signal: { default: macd2.signal, min: 1, max: 50, description: "MACD2 signal line period" },
});

const LONG_PARAMS = resonanceParams({ slow: 16, signal: 9 });
const SHORT_PARAMS = resonanceParams({ slow: 20, signal: 4 });

const resonanceSchema = (specs: typeof LONG_PARAMS) =>
	z
		.object({
			macd1Fast: intParam(specs.macd1Fast),
			macd1Slow: intParam(specs.macd1Slow),
			macd1Signal: intParam(specs.macd1Signal),
			macd2Fast: intParam(specs.macd2Fast),
			macd2Slow: intParam(specs.macd2Slow),
			macd2Signal: intParam(specs.macd2Signal),
		})
		.strict()
		.refine((params) => params.macd1Fast < params.macd1Slow, {
			message: "fast period must be shorter than slow period",
			path: ["macd1Fast"],
		})
		.refine((params) => params.macd2Fast < params.macd2Slow, {
			message: "fast period must be shorter than slow period",
			path: ["macd2Fast"],
		});

export const macdResonanceParamsSchema = resonanceSchema(LONG_PARAMS);
export const macdResonanceShortParamsSchema = resonanceSchema(SHORT_PARAMS);

export type MacdResonanceParams = z.infer<typeof macdResonanceParamsSchema>;

const resonanceMacds = (params: MacdResonanceParams): IndicatorSpec => ({
	macd: [
		{
			name: MACD1,
			fast: params.macd1Fast,
			slow: params.macd1Slow,
			signal: params.macd1Signal,
		},
		{
			name: MACD2,
			fast: params.macd2Fast,
			slow: params.macd2Slow,
			signal: params.macd2Signal,
		},
	],
});

export const isBearishBeyondThreshold = (kline: KlineEvent): boolean =>
	kline.close < kline.open &&
	(kline.close - kline.open) / kline.open < BEARISH_CANDLE_THRESHOLD;

const readPair = (input: StrategyInput) => {
	const macd1 = readyMacd(input.indicators.macds[MACD1]);
	const macd2 = readyMacd(input.indicators.macds[MACD2]);
	if (!macd1 || !macd2) {
		return null;
	}
	return {
		macd1,
		macd2,
		indicators: {
			close: input.kline.close,
			macd1: macdValues(macd1),
			macd2: macdValues(macd2),
		},
	};
};

/**
 * Long entries when two MACD pairs golden-cross on the same candle, unless the
 * candle was strongly bearish or jumped above every trend EMA at once. Exits
 * on a MACD2 death cross, or when price falls out of a pure EMA trend: through
 * EMA48 after a bullish one, through EMA16 after a bearish one.
 */
export class MacdResonanceStrategy implements Strategy {
	readonly type = "macd_resonance";
	readonly indicators: IndicatorSpec;

	constructor(readonly params: MacdResonanceParams) {
		this.indicators = {
			ema: [...TREND_EMA_PERIODS],
			...resonanceMacds(params),
		};
	}

	evaluate(input: StrategyInput): SignalPayload | null {
		const pair = readPair(input);
		if (!pair) {
			return null;
		}
		const { macd1, macd2 } = pair;
		const emas = input.indicators.emas;
		const trend = readEmaTrend(emas);
		const indicators = {
			...pair.indicators,
			...emaValues(emas),
			trend: trend.current,
		};

		if (macd1.goldenCross && macd2.goldenCross) {
			if (isBearishBeyondThreshold(input.kline)) {
				return buildPayload("NONE", "bearish_candle_filtered", indicators, this.params);
			}
			if (trend.crossedAboveAll) {
				return buildPayload("NONE", "crossed_all_emas_filtered", indicators, this.params);
			}
			return buildPayload("LONG", "macd_resonance_golden_cross", indicators, this.params);
		}
		if (macd2.deathCross) {
			return buildPayload("EXIT", "macd2_death_cross", indicators, this.params);
		}
		if (trend.brokeBullishTrend) {
			return buildPayload("EXIT", "bullish_trend_broken", indicators, this.params);
		}
		if (trend.brokeBearishTrend) {
			return buildPayload("EXIT", "bearish_trend_broken", indicators, this.params);
		}
		return buildPayload("NONE", "no_signal", indicators, this.params);
	}
}

/** Mirror of the long variant on death crosses, without the candle filter. */
export class MacdResonanceShortStrategy implements Strategy {
	readonly type = "macd_resonance_short";
	readonly indicators: IndicatorSpec;

	constructor(readonly params: MacdResonanceParams) {
		this.indicators = resonanceMacds(params);
	}

	evaluate(input: StrategyInput): SignalPayload | null {
		const pair = readPair(input);
		if (!pair) {
			return null;
		}
		const { macd1, macd2, indicators } = pair;

		if (macd1.deathCross && macd2.deathCross) {
			return buildPayload("SHORT", "macd_resonance_death_cross", indicators, this.params);
		}
		if (macd2.goldenCross) {
			return buildPayload("EXIT", "macd2_golden_cross", indicators, this.params);
		}
		return buildPayload("NONE", "no_signal", indicators, this.params);
	}
}

export const macdResonanceDefinition: StrategyDefinition = {
	type: "macd_resonance",
	name: "MACD resonance",
	description:
		"Two MACD pairs golden-crossing on the same candle, filtered by candle direction and an EMA4/16/48/96/192 trend",
	params: describeParams(LONG_PARAMS),
	create: (raw) =>
		new MacdResonanceStrategy(
			parseParams(macdResonanceParamsSchema, "macd_resonance", raw)
		),
};

export const macdResonanceShortDefinition: StrategyDefinition = {
	type: "macd_resonance_short",
	name: "MACD resonance short",
	description: "Two MACD pairs death-crossing on the same candle",
	params: describeParams(SHORT_PARAMS),
	create: (raw) =>
		new MacdResonanceShortStrategy(
			parseParams(macdResonanceShortParamsSchema, "macd_resonance_short", raw)
		),
};
