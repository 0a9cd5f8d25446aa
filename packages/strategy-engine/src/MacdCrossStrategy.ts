import type { SignalPayload } from "@sigflow/core";
import type { IndicatorSpec } from "@sigflow/indicators";
import { z } from "zod";
import { buildPayload, macdValues, readyMacd } from "./macdPayload";
import { describeParams, intParam, parseParams } from "./params";
import type { Strategy, StrategyDefinition, StrategyInput } from "./types";

const MACD = "macd";

const PARAMS = {
	fast: { default: 12, min: 1, max: 100, description: "Fast EMA period" },
	slow: { default: 26, min: 1, max: 200, description: "Slow EMA period" },
	signal: { default: 9, min: 1, max: 50, description: "Signal line period" },
};

export const macdCrossParamsSchema = z
	.object({
		fast: intParam(PARAMS.fast),
		slow: intParam(PARAMS.slow),
		signal: intParam(PARAMS.signal),
	})
	.strict()
	.refine((params) => params.fast < params.slow, {
		message: "fast period must be shorter than slow period",
		path: ["fast"],
	});

export type MacdCrossParams = z.infer<typeof macdCrossParamsSchema>;

/** LONG on a MACD golden cross, SHORT on a death cross. */
export class MacdCrossStrategy implements Strategy {
	readonly type = "macd_cross";
	readonly indicators: IndicatorSpec;

	constructor(readonly params: MacdCrossParams) {
		this.indicators = { macd: [{ name: MACD, ...params }] };
	}

	evaluate(input: StrategyInput): SignalPayload | null {
		const macd = readyMacd(input.indicators.macds[MACD]);
		if (!macd) {
			return null;
		}
		const indicators = { close: input.kline.close, macd: macdValues(macd) };

		if (macd.goldenCross) {
			return buildPayload("LONG", "macd_golden_cross", indicators, this.params);
		}
		if (macd.deathCross) {
			return buildPayload("SHORT", "macd_death_cross", indicators, this.params);
		}
		return buildPayload("NONE", "no_cross", indicators, this.params);
	}
}

export const macdCrossDefinition: StrategyDefinition = {
	type: "macd_cross",
	name: "MACD cross",
	description: "Single MACD golden/death cross on the subscribed interval",
	params: describeParams(PARAMS),
	create: (raw) =>
		new MacdCrossStrategy(parseParams(macdCrossParamsSchema, "macd_cross", raw)),
};
