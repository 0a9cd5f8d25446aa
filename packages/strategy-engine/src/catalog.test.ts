import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@sigflow/core";
import { StrategyCatalog } from "./catalog";

describe("StrategyCatalog", () => {
	const catalog = new StrategyCatalog();

	it("applies default params", () => {
		const strategy = catalog.create("macd_cross");

		expect(strategy.type).toBe("macd_cross");
		expect(strategy.params).toEqual({ fast: 12, slow: 26, signal: 9 });
	});

	it("merges given params over defaults", () => {
		const strategy = catalog.create("macd_resonance_short", { macd1Fast: 6 });

		expect(strategy.params).toEqual({
			macd1Fast: 6,
			macd1Slow: 26,
			macd1Signal: 9,
			macd2Fast: 4,
			macd2Slow: 20,
			macd2Signal: 4,
		});
	});

	it("rejects unknown strategy types", () => {
		expect(() => catalog.create("nope")).toThrow(ConfigurationError);
		expect(() => catalog.create("nope")).toThrow("Unknown strategy type: nope");
	});

	it("rejects params out of bounds", () => {
		expect(() => catalog.create("macd_cross", { fast: 0 })).toThrow(
			"Invalid params for strategy macd_cross: fast: Number must be greater than or equal to 1"
		);
	});

	it("rejects unknown params", () => {
		expect(() => catalog.create("macd_cross", { length: 3 })).toThrow(
			ConfigurationError
		);
	});

	it("rejects a fast period that is not shorter than the slow one", () => {
		expect(() => catalog.create("macd_resonance", { macd2Fast: 16 })).toThrow(
			"macd2Fast: fast period must be shorter than slow period"
		);
	});

	it("lists metadata for every strategy", () => {
		const listed = catalog.list();

		expect(listed.map((entry) => entry.type)).toEqual([
			"macd_cross",
			"macd_resonance",
			"macd_resonance_short",
		]);
		expect(listed[0]?.params[0]).toEqual({
			name: "fast",
			type: "int",
			default: 12,
			min: 1,
			max: 100,
			description: "Fast EMA period",
		});
	});
});
