import type { KlineEvent } from "@sigflow/core";

export const TRIGGER_TYPES = [
	"ONCE",
	"EACH_KLINE",
	"EACH_KLINE_CLOSE",
	"EACH_MINUTE",
] as const;

export type TriggerType = (typeof TRIGGER_TYPES)[number];

export interface TriggerState {
	triggerType: TriggerType;
	/** `eventTime` of the update that last fired */
	lastFiredAt: number | null;
	/** `openTime` of the last candle EACH_KLINE or EACH_KLINE_CLOSE fired for */
	lastKlineTime: number | null;
	firedOnce: boolean;
	lastMinuteBucket: number | null;
}

export type TriggerEvent = Pick<KlineEvent, "openTime" | "eventTime" | "isClosed">;

export interface TriggerDecision {
	fire: boolean;
	state: TriggerState;
	/** Carried into the emitted signal when `fire` is true. */
	reason: string;
}

/**
 * Stateless policy. The decision depends on the event and prior state only;
 * implementations must not read the clock.
 */
export interface TriggerPolicy {
	readonly type: TriggerType;
	shouldFire(event: TriggerEvent, prior: TriggerState): TriggerDecision;
}
