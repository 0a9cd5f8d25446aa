import { minuteBucket } from "@sigflow/core";
import type {
	TriggerDecision,
	TriggerEvent,
	TriggerPolicy,
	TriggerState,
} from "./types";

const hold = (prior: TriggerState, reason: string): TriggerDecision => ({
	fire: false,
	state: prior,
	reason,
});

const fire = (
	prior: TriggerState,
	event: TriggerEvent,
	reason: string,
	patch: Partial<TriggerState>
): TriggerDecision => ({
	fire: true,
	state: { ...prior, ...patch, lastFiredAt: event.eventTime },
	reason,
});

export class OncePolicy implements TriggerPolicy {
	readonly type = "ONCE";

	shouldFire(event: TriggerEvent, prior: TriggerState): TriggerDecision {
		if (prior.firedOnce) {
			return hold(prior, "already_fired");
		}
		return fire(prior, event, "first_event", { firedOnce: true });
	}
}

export class EachKlinePolicy implements TriggerPolicy {
	readonly type = "EACH_KLINE";

	shouldFire(event: TriggerEvent, prior: TriggerState): TriggerDecision {
		return fire(prior, event, "kline_update", {
			lastKlineTime: event.openTime,
		});
	}
}

export class EachKlineClosePolicy implements TriggerPolicy {
	readonly type = "EACH_KLINE_CLOSE";

	shouldFire(event: TriggerEvent, prior: TriggerState): TriggerDecision {
		if (!event.isClosed) {
			return hold(prior, "kline_open");
		}
		if (event.openTime === prior.lastKlineTime) {
			return hold(prior, "kline_already_closed");
		}
		return fire(prior, event, "kline_closed", {
			lastKlineTime: event.openTime,
		});
	}
}

/** Buckets on when updates arrive, so a long candle fires once per wall-clock minute. */
export class EachMinutePolicy implements TriggerPolicy {
	readonly type = "EACH_MINUTE";

	shouldFire(event: TriggerEvent, prior: TriggerState): TriggerDecision {
		const bucket = minuteBucket(event.eventTime);
		if (bucket === prior.lastMinuteBucket) {
			return hold(prior, "same_minute");
		}
		return fire(prior, event, "minute_boundary", { lastMinuteBucket: bucket });
	}
}
