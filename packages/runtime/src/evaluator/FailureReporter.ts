import {
	EvaluationError,
	ModuleLogger,
	SinkError,
	SubscriptionKey,
	toErrorMessage,
} from "@sigflow/core";
import { runtimeLogger } from "../logger";

export interface FailureReport {
	error: EvaluationError | SinkError;
	subscriptionKey: SubscriptionKey;
	strategyType: string;
	eventTime: number;
}

/** Observability collaborator for failures isolated to a single firing. */
export interface FailureReporter {
	report(failure: FailureReport): void;
}

export class LoggingFailureReporter implements FailureReporter {
	constructor(private readonly logger: ModuleLogger = runtimeLogger) {}

	report({ error, subscriptionKey, strategyType, eventTime }: FailureReport): void {
		this.logger.error(
			error.code === "EVALUATION_ERROR" ? "evaluation_failed" : "delivery_failed",
			{
				code: error.code,
				subscriptionKey,
				strategyType,
				eventTime,
				message: error.message,
				cause: error.cause === undefined ? undefined : toErrorMessage(error.cause),
			}
		);
	}
}
