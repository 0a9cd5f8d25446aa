import type { KlineEvent } from "@sigflow/core";
import { ApplyMode, IndicatorSpec, applyKline, createIndicatorSet } from "@sigflow/indicators";
import {
	TriggerDecision,
	TriggerPolicyRegistry,
	TriggerType,
	createTriggerState,
} from "@sigflow/trigger-engine";
import type { SubscriptionState } from "../state/types";

export type DropReason = "stale_event" | "reopened_closed_kline";

export type IndicatorStep =
	| { status: "dropped"; reason: DropReason }
	| { status: "applied" | "refined"; mode: ApplyMode; state: SubscriptionState };

export type SubscriptionStep =
	| { status: "dropped"; reason: DropReason }
	| {
			status: "applied" | "refined";
			state: SubscriptionState;
			decision: TriggerDecision;
	  };

export const createSubscriptionState = (
	indicators: IndicatorSpec,
	triggerType: TriggerType
): SubscriptionState => ({
	indicators: createIndicatorSet(indicators),
	trigger: createTriggerState(triggerType),
	lastOpenTime: null,
	lastClosed: false,
});

/**
 * Orders an event against the last applied candle by `openTime`. Older
 * candles are dropped, the same candle refines, and a closed candle cannot be
 * reopened.
 */
export const advanceIndicators = (
	prior: SubscriptionState,
	event: KlineEvent
): IndicatorStep => {
	let mode: ApplyMode = "append";
	if (prior.lastOpenTime !== null) {
		if (event.openTime < prior.lastOpenTime) {
			return { status: "dropped", reason: "stale_event" };
		}
		if (event.openTime === prior.lastOpenTime) {
			if (prior.lastClosed && !event.isClosed) {
				return { status: "dropped", reason: "reopened_closed_kline" };
			}
			mode = "refine";
		}
	}

	return {
		status: mode === "append" ? "applied" : "refined",
		mode,
		state: {
			indicators: applyKline(prior.indicators, event.close, mode),
			trigger: prior.trigger,
			lastOpenTime: event.openTime,
			lastClosed: event.isClosed,
		},
	};
};

/** Indicator update followed by the trigger decision, as one commit. */
export const advanceSubscription = (
	prior: SubscriptionState,
	event: KlineEvent,
	triggers: TriggerPolicyRegistry
): SubscriptionStep => {
	const step = advanceIndicators(prior, event);
	if (step.status === "dropped") {
		return step;
	}
	const decision = triggers.shouldFire(event, prior.trigger);
	return {
		status: step.status,
		state: { ...step.state, trigger: decision.state },
		decision,
	};
};
