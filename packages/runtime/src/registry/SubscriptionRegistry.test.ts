import { describe, it, expect, beforeEach } from "vitest";
import { ConflictError, ValidationError } from "@sigflow/core";
import { StrategyCatalog } from "@sigflow/strategy-engine";
import { SubscriptionRegistry } from "./SubscriptionRegistry";
import { createSubscriptionState } from "../pipeline/advance";

const catalog = new StrategyCatalog();
const KEY = "BINANCE:BTCUSDT@KLINE_1";

describe("SubscriptionRegistry", () => {
	let registry: SubscriptionRegistry;

	beforeEach(() => {
		registry = new SubscriptionRegistry(() => 1_000);
	});

	it("creates a record with no state until the first event", () => {
		const { record, created } = registry.register(
			KEY,
			catalog.create("macd_cross"),
			"EACH_KLINE_CLOSE"
		);

		expect(created).toBe(true);
		expect(record.state).toBeNull();
		expect(record.parsed).toEqual({
			exchange: "BINANCE",
			symbol: "BTCUSDT",
			dataType: "KLINE",
			interval: "1",
		});
		expect(record.registeredAt).toBe(1_000);
	});

	it("treats an identical registration as a no-op", () => {
		const first = registry.register(KEY, catalog.create("macd_cross"), "EACH_MINUTE");
		const second = registry.register(
			KEY,
			catalog.create("macd_cross", { fast: 12 }),
			"EACH_MINUTE"
		);

		expect(second.created).toBe(false);
		expect(second.record).toBe(first.record);
		expect(registry.size).toBe(1);
	});

	it("rejects a registration with different params or trigger", () => {
		registry.register(KEY, catalog.create("macd_cross"), "EACH_MINUTE");

		expect(() =>
			registry.register(KEY, catalog.create("macd_cross", { fast: 5 }), "EACH_MINUTE")
		).toThrow(ConflictError);
		expect(() =>
			registry.register(KEY, catalog.create("macd_cross"), "ONCE")
		).toThrow(ConflictError);
	});

	it("fails lookups of unknown keys", () => {
		expect(() => registry.get(KEY)).toThrow(ValidationError);
		expect(() => registry.get(KEY)).toThrow(`unknown subscription: ${KEY}`);
	});

	it("retires records on unregister", () => {
		const { record } = registry.register(KEY, catalog.create("macd_cross"), "ONCE");

		expect(registry.unregister(KEY)).toBe(record);
		expect(record.retired).toBe(true);
		expect(registry.keys()).toEqual([]);
		expect(registry.unregister(KEY)).toBeNull();
	});

	it("snapshots copies of the committed state", () => {
		const { record } = registry.register(KEY, catalog.create("macd_cross"), "ONCE");
		record.state = createSubscriptionState({ ema: [3] }, "ONCE");

		const [snapshot] = registry.snapshot();
		expect(snapshot?.key).toBe(KEY);
		expect(snapshot?.pending).toBe(0);
		expect(snapshot?.state).toEqual(record.state);
		expect(snapshot?.state).not.toBe(record.state);
	});
});
