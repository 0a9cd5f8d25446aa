export const STRATEGY_TYPES = [
	"macd_cross",
	"macd_resonance",
	"macd_resonance_short",
] as const;

export type StrategyType = (typeof STRATEGY_TYPES)[number];

export const isStrategyType = (value: unknown): value is StrategyType => {
	return (
		typeof value === "string" &&
		(STRATEGY_TYPES as readonly string[]).includes(value)
	);
};
