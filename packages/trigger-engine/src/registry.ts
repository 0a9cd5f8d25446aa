import { ConfigurationError } from "@sigflow/core";
import {
	EachKlineClosePolicy,
	EachKlinePolicy,
	EachMinutePolicy,
	OncePolicy,
} from "./policies";
import {
	TRIGGER_TYPES,
	TriggerDecision,
	TriggerEvent,
	TriggerPolicy,
	TriggerState,
	TriggerType,
} from "./types";

const ALIASES: Record<string, TriggerType> = {
	ONCE_ONLY: "ONCE",
};

export const isTriggerType = (value: unknown): value is TriggerType =>
	typeof value === "string" &&
	(TRIGGER_TYPES as readonly string[]).includes(value);

/** Accepts the canonical names and their lower-case spellings (`each_kline_close`, `once_only`). */
export const parseTriggerType = (value: string): TriggerType => {
	const normalized = value.trim().toUpperCase();
	const resolved = ALIASES[normalized] ?? normalized;
	if (!isTriggerType(resolved)) {
		throw new ConfigurationError(`Unknown trigger type: ${value}`, {
			triggerType: value,
		});
	}
	return resolved;
};

export const createTriggerState = (triggerType: TriggerType): TriggerState => {
	const zero: TriggerState = {
		triggerType,
		lastFiredAt: null,
		lastKlineTime: null,
		firedOnce: false,
		lastMinuteBucket: null,
	};
	switch (triggerType) {
		case "ONCE":
		case "EACH_KLINE":
		case "EACH_KLINE_CLOSE":
		case "EACH_MINUTE":
			return zero;
		default: {
			const unhandled: never = triggerType;
			throw new ConfigurationError(`Unknown trigger type: ${String(unhandled)}`);
		}
	}
};

export const createDefaultTriggerPolicies = (): Record<TriggerType, TriggerPolicy> => ({
	ONCE: new OncePolicy(),
	EACH_KLINE: new EachKlinePolicy(),
	EACH_KLINE_CLOSE: new EachKlineClosePolicy(),
	EACH_MINUTE: new EachMinutePolicy(),
});

/**
 * Maps every trigger type to its policy. Built once at startup and handed to
 * whatever needs to make fire decisions.
 */
export class TriggerPolicyRegistry {
	private readonly policies: Readonly<Record<TriggerType, TriggerPolicy>>;

	constructor(
		policies: Record<TriggerType, TriggerPolicy> = createDefaultTriggerPolicies()
	) {
		this.policies = { ...policies };
	}

	get(type: string): TriggerPolicy {
		if (!isTriggerType(type)) {
			throw new ConfigurationError(`Unknown trigger type: ${type}`, {
				triggerType: type,
			});
		}
		return this.policies[type];
	}

	shouldFire(event: TriggerEvent, prior: TriggerState): TriggerDecision {
		return this.get(prior.triggerType).shouldFire(event, prior);
	}
}
