import { describe, it, expect } from "vitest";
import { MacdCrossStrategy } from "./MacdCrossStrategy";
import { macdSnapshot, strategyInput } from "./testInput";

const params = { fast: 12, slow: 26, signal: 9 };

describe("MacdCrossStrategy", () => {
	const strategy = new MacdCrossStrategy(params);

	it("maintains one macd named after the strategy params", () => {
		expect(strategy.indicators).toEqual({
			macd: [{ name: "macd", fast: 12, slow: 26, signal: 9 }],
		});
	});

	it("goes long on a golden cross", () => {
		const payload = strategy.evaluate(
			strategyInput({ macd: macdSnapshot({ goldenCross: true }) })
		);

		expect(payload).toEqual({
			decision: "LONG",
			reason: "macd_golden_cross",
			indicators: {
				close: 100,
				macd: { macdLine: 1, signalLine: 0.5, histogram: 0.5 },
			},
			params: { fast: 12, slow: 26, signal: 9 },
		});
	});

	it("goes short on a death cross", () => {
		const payload = strategy.evaluate(
			strategyInput({
				macd: macdSnapshot({ macdLine: -1, signalLine: 0, deathCross: true }),
			})
		);

		expect(payload?.decision).toBe("SHORT");
		expect(payload?.reason).toBe("macd_death_cross");
	});

	it("reports no decision between crosses", () => {
		const payload = strategy.evaluate(strategyInput({ macd: macdSnapshot() }));

		expect(payload?.decision).toBe("NONE");
		expect(payload?.reason).toBe("no_cross");
	});

	it("returns null while the signal line is warming up", () => {
		const warming = macdSnapshot({ signalLine: null, histogram: null, bias: null });

		expect(strategy.evaluate(strategyInput({ macd: warming }))).toBeNull();
		expect(strategy.evaluate(strategyInput({}))).toBeNull();
	});
});
