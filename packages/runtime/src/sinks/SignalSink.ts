import type { ModuleLogger, Signal } from "@sigflow/core";
import { runtimeLogger } from "../logger";

/** Downstream collaborator that persists or publishes emitted signals. */
export interface SignalSink {
	deliver(signal: Signal): void | Promise<void>;
}

export class LoggingSignalSink implements SignalSink {
	constructor(private readonly logger: ModuleLogger = runtimeLogger) {}

	deliver(signal: Signal): void {
		this.logger.info("signal_emitted", {
			subscriptionKey: signal.subscriptionKey,
			strategyType: signal.strategyType,
			triggerReason: signal.triggerReason,
			computedAt: signal.computedAt,
			decision: signal.payload.decision,
			reason: signal.payload.reason,
			close: signal.payload.indicators.close,
			indicators: signal.payload.indicators,
		});
	}
}
