import PQueue from "p-queue";
import {
	EvaluationError,
	KlineEvent,
	ParsedSubscriptionKey,
	Signal,
	SignalPayload,
	SinkError,
	SubscriptionKey,
	toErrorMessage,
} from "@sigflow/core";
import type { IndicatorSnapshot } from "@sigflow/indicators";
import type { Strategy, StrategyInput } from "@sigflow/strategy-engine";
import type { SignalSink } from "../sinks/SignalSink";
import type { FailureReporter } from "./FailureReporter";
import { deepFreeze } from "./freeze";

export interface EvaluationJob {
	subscriptionKey: SubscriptionKey;
	parsed: ParsedSubscriptionKey;
	strategy: Strategy;
	event: Readonly<KlineEvent>;
	indicators: IndicatorSnapshot;
	triggerReason: string;
}

export type DispatchOutcome =
	| { status: "emitted"; signal: Signal }
	| { status: "empty" }
	| { status: "failed"; error: EvaluationError | SinkError };

export interface StrategyEvaluatorOptions {
	sink: SignalSink;
	reporter: FailureReporter;
	evaluationTimeoutMs: number;
	sinkTimeoutMs: number;
	concurrency: number;
	clock?: () => number;
}

const isTimeout = (error: unknown): boolean =>
	error instanceof Error && error.name === "TimeoutError";

/**
 * Runs strategies off the subscription lanes. Evaluation and delivery each
 * go through a bounded queue with a per-task timeout; failures are reported
 * and never rethrown.
 */
export class StrategyEvaluator {
	private readonly evaluations: PQueue;
	private readonly deliveries: PQueue;
	private readonly clock: () => number;

	constructor(private readonly options: StrategyEvaluatorOptions) {
		this.evaluations = new PQueue({
			concurrency: options.concurrency,
			timeout: options.evaluationTimeoutMs,
			throwOnTimeout: true,
		});
		this.deliveries = new PQueue({
			concurrency: options.concurrency,
			timeout: options.sinkTimeoutMs,
			throwOnTimeout: true,
		});
		this.clock = options.clock ?? Date.now;
	}

	buildInput(job: EvaluationJob, computedAt: number): StrategyInput {
		return deepFreeze({
			symbol: job.parsed.symbol,
			interval: job.parsed.interval,
			kline: { ...job.event },
			subscriptionKey: job.subscriptionKey,
			computedAt,
			indicators: structuredClone(job.indicators),
		});
	}

	async dispatch(job: EvaluationJob): Promise<DispatchOutcome> {
		const computedAt = this.clock();
		const input = this.buildInput(job, computedAt);

		let payload: SignalPayload | null;
		try {
			payload = await this.evaluations.add<SignalPayload | null>(async () =>
				job.strategy.evaluate(input)
			);
		} catch (cause) {
			return this.fail(
				job,
				new EvaluationError(
					isTimeout(cause)
						? `Strategy evaluation timed out after ${this.options.evaluationTimeoutMs}ms`
						: `Strategy ${job.strategy.type} failed: ${toErrorMessage(cause)}`,
					{ subscriptionKey: job.subscriptionKey, strategyType: job.strategy.type },
					cause
				)
			);
		}

		if (!payload) {
			return { status: "empty" };
		}

		const signal: Signal = {
			strategyType: job.strategy.type,
			subscriptionKey: job.subscriptionKey,
			triggerReason: job.triggerReason,
			computedAt,
			payload,
		};

		try {
			await this.deliveries.add<void>(async () => {
				await this.options.sink.deliver(signal);
			});
		} catch (cause) {
			return this.fail(
				job,
				new SinkError(
					isTimeout(cause)
						? `Signal delivery timed out after ${this.options.sinkTimeoutMs}ms`
						: `Signal delivery failed: ${toErrorMessage(cause)}`,
					{ subscriptionKey: job.subscriptionKey, strategyType: job.strategy.type },
					cause
				)
			);
		}

		return { status: "emitted", signal };
	}

	/** Resolves once no evaluation or delivery is queued or running. */
	async onIdle(): Promise<void> {
		await this.evaluations.onIdle();
		await this.deliveries.onIdle();
	}

	get pending(): number {
		return (
			this.evaluations.size +
			this.evaluations.pending +
			this.deliveries.size +
			this.deliveries.pending
		);
	}

	private fail(
		job: EvaluationJob,
		error: EvaluationError | SinkError
	): DispatchOutcome {
		this.options.reporter.report({
			error,
			subscriptionKey: job.subscriptionKey,
			strategyType: job.strategy.type,
			eventTime: job.event.eventTime,
		});
		return { status: "failed", error };
	}
}
