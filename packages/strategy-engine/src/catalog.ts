import { ConfigurationError } from "@sigflow/core";
import { macdCrossDefinition } from "./MacdCrossStrategy";
import {
	macdResonanceDefinition,
	macdResonanceShortDefinition,
} from "./MacdResonanceStrategy";
import { StrategyType, isStrategyType } from "./ids";
import type { Strategy, StrategyDefinition, StrategyMetadata } from "./types";

export const DEFAULT_STRATEGY_DEFINITIONS: Record<StrategyType, StrategyDefinition> = {
	macd_cross: macdCrossDefinition,
	macd_resonance: macdResonanceDefinition,
	macd_resonance_short: macdResonanceShortDefinition,
};

/**
 * Metadata collaborator consulted when a subscription is created. Validates
 * the strategy type and its params; never used per event.
 */
export class StrategyCatalog {
	constructor(
		private readonly definitions: Record<
			StrategyType,
			StrategyDefinition
		> = DEFAULT_STRATEGY_DEFINITIONS
	) {}

	get(type: string): StrategyDefinition {
		if (!isStrategyType(type)) {
			throw new ConfigurationError(`Unknown strategy type: ${type}`, {
				strategyType: type,
			});
		}
		return this.definitions[type];
	}

	create(type: string, params: Record<string, unknown> = {}): Strategy {
		return this.get(type).create(params);
	}

	list(): StrategyMetadata[] {
		return Object.values(this.definitions).map(
			({ type, name, description, params }) => ({
				type,
				name,
				description,
				params: params.map((param) => ({ ...param })),
			})
		);
	}
}
