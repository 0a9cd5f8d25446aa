import type { EmaSnapshot } from "@sigflow/indicators";
import { emaKey } from "@sigflow/indicators";

export const TREND_EMA_PERIODS = [4, 16, 48, 96, 192];

export type TrendState = "bullish_pure" | "bearish_pure" | "mixed";

export interface TrendLevels {
	ema4: number;
	ema16: number;
	ema48: number;
	ema96: number;
	ema192: number;
}

const readLevels = (
	emas: Record<string, EmaSnapshot>,
	field: "value" | "previous"
): TrendLevels | null => {
	const level = (period: number): number | null => emas[emaKey(period)]?.[field] ?? null;
	const ema4 = level(4);
	const ema16 = level(16);
	const ema48 = level(48);
	const ema96 = level(96);
	const ema192 = level(192);
	if (ema4 === null || ema16 === null || ema48 === null || ema96 === null || ema192 === null) {
		return null;
	}
	return { ema4, ema16, ema48, ema96, ema192 };
};

/**
 * "Pure" means the slow EMAs are stacked in one direction and the two fast
 * ones sit on the same side of EMA48.
 */
export const classifyTrend = (levels: TrendLevels | null): TrendState => {
	if (!levels) {
		return "mixed";
	}
	const { ema4, ema16, ema48, ema96, ema192 } = levels;
	if (ema96 > ema192 && ema48 > ema96 && ema16 > ema48 && ema4 > ema48) {
		return "bullish_pure";
	}
	if (ema96 < ema192 && ema48 < ema96 && ema16 < ema48 && ema4 < ema48) {
		return "bearish_pure";
	}
	return "mixed";
};

export interface EmaTrend {
	previous: TrendState;
	current: TrendState;
	crossedAboveAll: boolean;
	/** Price fell through EMA48 out of a bullish pure state */
	brokeBullishTrend: boolean;
	/** Price fell through EMA16 out of a bearish pure state */
	brokeBearishTrend: boolean;
}

export const readEmaTrend = (emas: Record<string, EmaSnapshot>): EmaTrend => {
	const previous = classifyTrend(readLevels(emas, "previous"));
	return {
		previous,
		current: classifyTrend(readLevels(emas, "value")),
		crossedAboveAll: TREND_EMA_PERIODS.every(
			(period) => emas[emaKey(period)]?.priceCrossAbove === true
		),
		brokeBullishTrend:
			previous === "bullish_pure" && emas[emaKey(48)]?.priceCrossBelow === true,
		brokeBearishTrend:
			previous === "bearish_pure" && emas[emaKey(16)]?.priceCrossBelow === true,
	};
};

export const emaValues = (emas: Record<string, EmaSnapshot>): Record<string, number | null> => {
	const values: Record<string, number | null> = {};
	for (const period of TREND_EMA_PERIODS) {
		values[emaKey(period)] = emas[emaKey(period)]?.value ?? null;
	}
	return values;
};
