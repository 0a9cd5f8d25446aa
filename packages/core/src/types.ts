export * from "./time";

/**
 * Normalized kline update as delivered by the ingestion layer.
 *
 * `openTime` identifies the candle: two events with the same `openTime`
 * describe the same candle, the later one refining the earlier. `eventTime`
 * is when this update was produced.
 */
export interface KlineEvent {
	symbol: string;
	interval: string;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	openTime: number;
	eventTime: number;
	isClosed: boolean;
}

/** `EXCHANGE:SYMBOL@KLINE_INTERVAL` */
export type SubscriptionKey = string;

export interface ParsedSubscriptionKey {
	exchange: string;
	symbol: string;
	dataType: "KLINE";
	interval: string;
}

export type SignalDecision = "LONG" | "SHORT" | "EXIT" | "NONE";

export interface SignalPayload {
	decision: SignalDecision;
	reason: string;
	indicators: Record<string, unknown>;
	params?: Record<string, unknown>;
}

export interface Signal {
	strategyType: string;
	subscriptionKey: SubscriptionKey;
	triggerReason: string;
	computedAt: number;
	payload: SignalPayload;
}
