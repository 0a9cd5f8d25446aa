import type { SignalDecision, SignalPayload } from "@sigflow/core";
import type { MacdSnapshot } from "@sigflow/indicators";
import type { StrategyParams } from "./types";

export interface ReadyMacd {
	macdLine: number;
	signalLine: number;
	histogram: number;
	goldenCross: boolean;
	deathCross: boolean;
}

/** Narrows a snapshot to one whose lines are both available. */
export const readyMacd = (snapshot: MacdSnapshot | undefined): ReadyMacd | null => {
	if (!snapshot) {
		return null;
	}
	const { macdLine, signalLine, goldenCross, deathCross } = snapshot;
	if (macdLine === null || signalLine === null) {
		return null;
	}
	return {
		macdLine,
		signalLine,
		histogram: macdLine - signalLine,
		goldenCross,
		deathCross,
	};
};

export const macdValues = (macd: ReadyMacd): Record<string, number> => ({
	macdLine: macd.macdLine,
	signalLine: macd.signalLine,
	histogram: macd.histogram,
});

export const buildPayload = (
	decision: SignalDecision,
	reason: string,
	indicators: Record<string, unknown>,
	params: StrategyParams
): SignalPayload => ({
	decision,
	reason,
	indicators,
	params: { ...params },
});
