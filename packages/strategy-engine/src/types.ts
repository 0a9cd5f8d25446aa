import type { KlineEvent, SignalPayload, SubscriptionKey } from "@sigflow/core";
import type { IndicatorSnapshot, IndicatorSpec } from "@sigflow/indicators";
import type { StrategyType } from "./ids";

/** Frozen view handed to a strategy when a trigger fires. */
export interface StrategyInput {
	symbol: string;
	interval: string;
	kline: Readonly<KlineEvent>;
	subscriptionKey: SubscriptionKey;
	computedAt: number;
	indicators: IndicatorSnapshot;
}

export type StrategyParams = Readonly<Record<string, number>>;

export interface Strategy {
	readonly type: StrategyType;
	/** Normalized parameters, defaults applied. */
	readonly params: StrategyParams;
	/** Indicators the subscription must maintain for this strategy. */
	readonly indicators: IndicatorSpec;
	/** Returns null while the indicators it needs are still warming up. */
	evaluate(
		input: StrategyInput
	): SignalPayload | null | Promise<SignalPayload | null>;
}

export interface IntParamSpec {
	default: number;
	min: number;
	max: number;
	description: string;
}

export interface StrategyParamDescriptor extends IntParamSpec {
	name: string;
	type: "int";
}

export interface StrategyMetadata {
	type: StrategyType;
	name: string;
	description: string;
	params: StrategyParamDescriptor[];
}

export interface StrategyDefinition extends StrategyMetadata {
	create: (params: Record<string, unknown>) => Strategy;
}
