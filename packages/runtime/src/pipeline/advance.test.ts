import { describe, it, expect } from "vitest";
import type { KlineEvent } from "@sigflow/core";
import { TriggerPolicyRegistry } from "@sigflow/trigger-engine";
import {
	SubscriptionStep,
	advanceIndicators,
	advanceSubscription,
	createSubscriptionState,
} from "./advance";

const triggers = new TriggerPolicyRegistry();

const kline = (
	openTime: number,
	close: number,
	isClosed = true,
	eventTime = openTime + 30_000
): KlineEvent => ({
	symbol: "BTCUSDT",
	interval: "1m",
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
	openTime,
	eventTime,
	isClosed,
});

const commit = (step: SubscriptionStep) => {
	if (step.status === "dropped") {
		throw new Error(`unexpected drop: ${step.reason}`);
	}
	return step;
};

const fresh = () => createSubscriptionState({ ema: [3] }, "EACH_KLINE_CLOSE");

describe("advanceSubscription", () => {
	it("refines the open candle and fires when it closes", () => {
		const opened = commit(advanceSubscription(fresh(), kline(0, 10, false), triggers));
		expect(opened.status).toBe("applied");
		expect(opened.decision.fire).toBe(false);

		const closed = commit(advanceSubscription(opened.state, kline(0, 12), triggers));
		expect(closed.status).toBe("refined");
		expect(closed.decision).toMatchObject({ fire: true, reason: "kline_closed" });
		expect(closed.state.indicators.samples).toBe(1);
		expect(closed.state.lastClosed).toBe(true);
		expect(closed.state.trigger.lastKlineTime).toBe(0);
	});

	it("refines by open time whatever the update time", () => {
		const opened = commit(advanceSubscription(fresh(), kline(0, 10, false, 5_000), triggers));
		const later = commit(advanceSubscription(opened.state, kline(0, 11, false, 45_000), triggers));

		expect(later.status).toBe("refined");
		expect(later.state.lastOpenTime).toBe(0);
		expect(later.state.indicators.samples).toBe(1);
	});

	it("drops events older than the last applied one", () => {
		const state = commit(advanceSubscription(fresh(), kline(60_000, 10), triggers)).state;

		expect(advanceSubscription(state, kline(0, 11), triggers)).toEqual({
			status: "dropped",
			reason: "stale_event",
		});
	});

	it("drops an update that would reopen a closed candle", () => {
		const state = commit(advanceSubscription(fresh(), kline(0, 10), triggers)).state;

		expect(advanceSubscription(state, kline(0, 10, false), triggers)).toEqual({
			status: "dropped",
			reason: "reopened_closed_kline",
		});
	});

	it("does not fire twice for a re-delivered close", () => {
		let state = fresh();
		for (const close of [10, 11, 12]) {
			state = commit(advanceSubscription(state, kline(close * 60_000, close), triggers)).state;
		}
		const again = commit(advanceSubscription(state, kline(12 * 60_000, 12), triggers));

		expect(again.status).toBe("refined");
		expect(again.decision.fire).toBe(false);
		expect(again.state.indicators.current.emas.ema3?.value).toBe(11);
		expect(again.state.indicators.samples).toBe(3);
	});
});

describe("advanceIndicators", () => {
	it("leaves the trigger state alone", () => {
		const prior = fresh();
		const step = advanceIndicators(prior, kline(0, 10));

		expect(step.status).toBe("applied");
		if (step.status !== "dropped") {
			expect(step.state.trigger).toBe(prior.trigger);
			expect(step.state.lastOpenTime).toBe(0);
		}
	});
});
