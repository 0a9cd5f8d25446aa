import type { SubscriptionKey } from "@sigflow/core";
import type { IndicatorSet } from "@sigflow/indicators";
import type { TriggerState, TriggerType } from "@sigflow/trigger-engine";

/** Mutable part of a subscription, replaced wholesale on every commit. */
export interface SubscriptionState {
	indicators: IndicatorSet;
	trigger: TriggerState;
	lastOpenTime: number | null;
	lastClosed: boolean;
}

export interface PersistedSubscriptionState {
	version: 1;
	subscriptionKey: SubscriptionKey;
	strategyType: string;
	params: Record<string, number>;
	triggerType: TriggerType;
	state: SubscriptionState;
	savedAt: number;
}

/**
 * Where subscription state goes between process runs. Saved after each
 * closed candle and whenever the trigger state moves, loaded before the
 * first event of a key, removed on unsubscribe.
 */
export interface SubscriptionStateStore {
	load(key: SubscriptionKey): Promise<PersistedSubscriptionState | null>;
	save(snapshot: PersistedSubscriptionState): Promise<void>;
	delete(key: SubscriptionKey): Promise<void>;
}
