import {
	EngineConfig,
	KlineEvent,
	ModuleLogger,
	SubscriptionKey,
	ValidationError,
	buildSubscriptionKey,
	intervalToMs,
	toErrorMessage,
	validateKlineEvent,
} from "@sigflow/core";
import { snapshotIndicators } from "@sigflow/indicators";
import { StrategyCatalog, StrategyMetadata } from "@sigflow/strategy-engine";
import { TriggerPolicyRegistry, parseTriggerType } from "@sigflow/trigger-engine";
import {
	DispatchOutcome,
	StrategyEvaluator,
} from "./evaluator/StrategyEvaluator";
import { FailureReporter, LoggingFailureReporter } from "./evaluator/FailureReporter";
import type { KlineHistorySource } from "./history/CcxtKlineHistory";
import { runtimeLogger } from "./logger";
import {
	DropReason,
	advanceIndicators,
	advanceSubscription,
	createSubscriptionState,
} from "./pipeline/advance";
import { byOpenTime, contiguousTail, isContiguous, missingKlines } from "./pipeline/continuity";
import {
	SubscriptionRecord,
	SubscriptionRegistry,
	SubscriptionSnapshot,
	sameParams,
} from "./registry/SubscriptionRegistry";
import type { SignalSink } from "./sinks/SignalSink";
import type {
	PersistedSubscriptionState,
	SubscriptionState,
	SubscriptionStateStore,
} from "./state/types";

export type EngineSettings = Pick<
	EngineConfig,
	| "exchange"
	| "evaluationTimeoutMs"
	| "sinkTimeoutMs"
	| "evaluationConcurrency"
	| "warmupKlines"
>;

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
	exchange: "BINANCE",
	evaluationTimeoutMs: 5_000,
	sinkTimeoutMs: 5_000,
	evaluationConcurrency: 16,
	warmupKlines: 280,
};

export interface SignalEngineOptions {
	sink: SignalSink;
	settings?: Partial<EngineSettings>;
	catalog?: StrategyCatalog;
	triggers?: TriggerPolicyRegistry;
	reporter?: FailureReporter;
	stateStore?: SubscriptionStateStore;
	/** Backfills gaps in the live stream; without it a gap resets the indicators */
	history?: KlineHistorySource;
	clock?: () => number;
	logger?: ModuleLogger;
}

export type IngestResult =
	| { status: "dropped"; fired: false; reason: DropReason | "unsubscribed" }
	| {
			status: "applied" | "refined";
			fired: boolean;
			reason: string;
			/** Present when the trigger fired; settles once evaluation and delivery are done. */
			evaluation?: Promise<DispatchOutcome>;
	  };

export interface WarmupResult {
	applied: number;
	skipped: number;
	/** Holes in the replayed klines; indicators restart after each */
	gaps: number;
}

/**
 * Wires the registry, trigger policies, indicator pipeline and evaluator
 * into the control surface used by ingestion and subscription management.
 */
export class SignalEngine {
	private readonly settings: EngineSettings;
	private readonly catalog: StrategyCatalog;
	private readonly triggers: TriggerPolicyRegistry;
	private readonly registry: SubscriptionRegistry;
	private readonly evaluator: StrategyEvaluator;
	private readonly stateStore: SubscriptionStateStore | null;
	private readonly history: KlineHistorySource | null;
	private readonly clock: () => number;
	private readonly logger: ModuleLogger;
	private readonly inFlight = new Set<Promise<DispatchOutcome>>();
	private readonly pendingDeletes = new Map<SubscriptionKey, Promise<void>>();
	private stopped = false;

	constructor(options: SignalEngineOptions) {
		this.settings = { ...DEFAULT_ENGINE_SETTINGS, ...options.settings };
		this.catalog = options.catalog ?? new StrategyCatalog();
		this.triggers = options.triggers ?? new TriggerPolicyRegistry();
		this.clock = options.clock ?? Date.now;
		this.registry = new SubscriptionRegistry(this.clock);
		this.stateStore = options.stateStore ?? null;
		this.history = options.history ?? null;
		this.logger = options.logger ?? runtimeLogger;
		this.evaluator = new StrategyEvaluator({
			sink: options.sink,
			reporter: options.reporter ?? new LoggingFailureReporter(this.logger),
			evaluationTimeoutMs: this.settings.evaluationTimeoutMs,
			sinkTimeoutMs: this.settings.sinkTimeoutMs,
			concurrency: this.settings.evaluationConcurrency,
			clock: this.clock,
		});
	}

	/**
	 * Binds a strategy and trigger policy to a symbol/interval. Repeating an
	 * identical subscription is a no-op.
	 * @throws ValidationError for a malformed symbol or interval
	 * @throws ConfigurationError for an unknown strategy or trigger type, or invalid params
	 * @throws ConflictError when the key is bound to something else
	 */
	subscribe(
		symbol: string,
		interval: string,
		strategyType: string,
		triggerType: string,
		params: Record<string, unknown> = {}
	): SubscriptionKey {
		const key = buildSubscriptionKey(symbol, interval, this.settings.exchange);
		const trigger = parseTriggerType(triggerType);
		const strategy = this.catalog.create(strategyType, params);
		const { created } = this.registry.register(key, strategy, trigger);
		if (created) {
			this.logger.info("subscription_registered", {
				subscriptionKey: key,
				strategyType: strategy.type,
				triggerType: trigger,
				params: { ...strategy.params },
			});
		}
		return key;
	}

	/** Resolves false when the key was not subscribed. */
	async unsubscribe(key: SubscriptionKey): Promise<boolean> {
		const record = this.registry.unregister(key);
		if (!record) {
			return false;
		}
		const cleanup = this.discard(record);
		this.pendingDeletes.set(key, cleanup);
		try {
			await cleanup;
		} finally {
			if (this.pendingDeletes.get(key) === cleanup) {
				this.pendingDeletes.delete(key);
			}
		}
		this.logger.info("subscription_unregistered", { subscriptionKey: key });
		return true;
	}

	/**
	 * Validates synchronously, then queues the event on its key's lane.
	 * @throws ValidationError for a malformed event or an unknown subscription
	 */
	ingest(input: unknown): Promise<IngestResult> {
		this.ensureRunning();
		const event = validateKlineEvent(input);
		const key = buildSubscriptionKey(event.symbol, event.interval, this.settings.exchange);
		const record = this.registry.get(key);
		return record.lane.add<IngestResult>(() => this.process(record, event));
	}

	/**
	 * Feeds closed historical klines through the indicators without consulting
	 * the trigger policy. Klines at or before the last applied one are skipped,
	 * and a hole in the sequence restarts the indicators.
	 */
	warmup(key: SubscriptionKey, klines: readonly unknown[]): Promise<WarmupResult> {
		this.ensureRunning();
		const record = this.registry.get(key);
		const events = klines.map((kline) => {
			const event = validateKlineEvent(kline);
			const eventKey = buildSubscriptionKey(event.symbol, event.interval, record.parsed.exchange);
			if (eventKey !== key) {
				throw new ValidationError(`Warm-up kline belongs to ${eventKey}, not ${key}`, {
					subscriptionKey: key,
				});
			}
			return event;
		});
		return record.lane.add<WarmupResult>(() => this.replay(record, events));
	}

	snapshot(): SubscriptionSnapshot[] {
		return this.registry.snapshot();
	}

	strategies(): StrategyMetadata[] {
		return this.catalog.list();
	}

	subscriptions(): SubscriptionKey[] {
		return this.registry.keys();
	}

	/** Waits until every lane and every evaluation started so far has settled. */
	async whenIdle(): Promise<void> {
		while (this.busy()) {
			await Promise.all(this.registry.list().map((record) => record.lane.onIdle()));
			await Promise.all([...this.inFlight]);
			await Promise.all([...this.pendingDeletes.values()]);
			await this.evaluator.onIdle();
		}
	}

	/** Rejects further input and drains work already accepted. */
	async stop(): Promise<void> {
		this.stopped = true;
		await this.whenIdle();
		this.logger.info("engine_stopped", { subscriptions: this.registry.size });
	}

	private busy(): boolean {
		return (
			this.inFlight.size > 0 ||
			this.pendingDeletes.size > 0 ||
			this.evaluator.pending > 0 ||
			this.registry
				.list()
				.some((record) => record.lane.size > 0 || record.lane.pending > 0)
		);
	}

	private ensureRunning(): void {
		if (this.stopped) {
			throw new ValidationError("Signal engine is stopped");
		}
	}

	private async process(
		record: SubscriptionRecord,
		event: Readonly<KlineEvent>
	): Promise<IngestResult> {
		if (record.retired) {
			return { status: "dropped", fired: false, reason: "unsubscribed" };
		}
		const prior = await this.closeGap(record, await this.hydrate(record), event);
		const step = advanceSubscription(prior, event, this.triggers);

		if (step.status === "dropped") {
			this.logger.debug("event_dropped", {
				subscriptionKey: record.key,
				openTime: event.openTime,
				eventTime: event.eventTime,
				lastOpenTime: prior.lastOpenTime,
				reason: step.reason,
			});
			return { status: "dropped", fired: false, reason: step.reason };
		}

		record.state = step.state;
		if (event.isClosed || step.state.trigger !== prior.trigger) {
			await this.persist(record, step.state);
		}

		const { decision } = step;
		if (!decision.fire) {
			return { status: step.status, fired: false, reason: decision.reason };
		}

		const evaluation = this.track(
			this.evaluator.dispatch({
				subscriptionKey: record.key,
				parsed: record.parsed,
				strategy: record.strategy,
				event,
				indicators: snapshotIndicators(step.state.indicators),
				triggerReason: decision.reason,
			})
		);
		return { status: step.status, fired: true, reason: decision.reason, evaluation };
	}

	private async replay(
		record: SubscriptionRecord,
		events: Array<Readonly<KlineEvent>>
	): Promise<WarmupResult> {
		if (record.retired) {
			return { applied: 0, skipped: events.length, gaps: 0 };
		}
		const intervalMs = intervalToMs(record.parsed.interval);
		let state = await this.hydrate(record);
		let applied = 0;
		let skipped = 0;
		let gaps = 0;

		for (const event of [...events].sort(byOpenTime)) {
			if (!event.isClosed) {
				skipped += 1;
				continue;
			}
			if (missingKlines(state.lastOpenTime, event.openTime, intervalMs) > 0) {
				gaps += 1;
				state = this.restart(record, state);
			}
			const step = advanceIndicators(state, event);
			if (step.status === "dropped" || (step.status === "refined" && state.lastClosed)) {
				skipped += 1;
				continue;
			}
			state = step.state;
			applied += 1;
		}

		record.state = state;
		if (applied > 0) {
			await this.persist(record, state);
		}
		this.logger.info("warmup_completed", {
			subscriptionKey: record.key,
			applied,
			skipped,
			gaps,
			samples: state.indicators.samples,
		});
		return { applied, skipped, gaps };
	}

	/**
	 * Fills missing candles between the last applied one and `event` from
	 * history. When the hole cannot be bridged the indicators restart, from
	 * the fetched klines when they reach up to `event`.
	 */
	private async closeGap(
		record: SubscriptionRecord,
		prior: SubscriptionState,
		event: Readonly<KlineEvent>
	): Promise<SubscriptionState> {
		const intervalMs = intervalToMs(record.parsed.interval);
		const lastOpenTime = prior.lastOpenTime;
		const missing = missingKlines(lastOpenTime, event.openTime, intervalMs);
		if (lastOpenTime === null || missing === 0) {
			return prior;
		}
		const context = {
			subscriptionKey: record.key,
			lastOpenTime,
			openTime: event.openTime,
			missing,
		};

		// the last applied candle comes back too when it never closed
		const fetched = await this.fetchGap(
			record,
			Math.min(missing + 1, this.settings.warmupKlines),
			context
		);
		const between = contiguousTail(
			fetched
				.filter(
					(kline) =>
						kline.isClosed &&
						kline.openTime < event.openTime &&
						(kline.openTime > lastOpenTime ||
							(kline.openTime === lastOpenTime && !prior.lastClosed))
				)
				.sort(byOpenTime),
			intervalMs
		);
		const openTimes = between.map((kline) => kline.openTime);

		if (
			between.length > 0 &&
			isContiguous([lastOpenTime, ...openTimes, event.openTime], intervalMs)
		) {
			this.logger.info("kline_gap_filled", { ...context, filled: between.length });
			return this.applyClosed(prior, between);
		}
		const restarted = this.restart(record, prior);
		if (between.length > 0 && isContiguous([...openTimes, event.openTime], intervalMs)) {
			this.logger.warn("kline_gap_rewarmed", { ...context, replayed: between.length });
			return this.applyClosed(restarted, between);
		}
		this.logger.warn("kline_gap_reset", context);
		return restarted;
	}

	private async fetchGap(
		record: SubscriptionRecord,
		limit: number,
		context: Record<string, unknown>
	): Promise<KlineEvent[]> {
		if (!this.history || limit <= 0) {
			return [];
		}
		try {
			return await this.history.fetchClosedKlines(record.parsed, limit);
		} catch (error) {
			this.logger.warn("kline_gap_fetch_failed", {
				...context,
				message: toErrorMessage(error),
			});
			return [];
		}
	}

	private applyClosed(
		state: SubscriptionState,
		klines: readonly KlineEvent[]
	): SubscriptionState {
		let next = state;
		for (const kline of klines) {
			const step = advanceIndicators(next, kline);
			if (step.status !== "dropped") {
				next = step.state;
			}
		}
		return next;
	}

	/** Fresh indicators; the trigger state carries over. */
	private restart(record: SubscriptionRecord, state: SubscriptionState): SubscriptionState {
		return {
			...createSubscriptionState(record.strategy.indicators, record.triggerType),
			trigger: state.trigger,
		};
	}

	private async hydrate(record: SubscriptionRecord): Promise<SubscriptionState> {
		if (record.state) {
			return record.state;
		}
		const restored = await this.restore(record);
		record.state =
			restored ?? createSubscriptionState(record.strategy.indicators, record.triggerType);
		return record.state;
	}

	private async restore(record: SubscriptionRecord): Promise<SubscriptionState | null> {
		if (!this.stateStore) {
			return null;
		}
		await this.pendingDeletes.get(record.key);

		let persisted: PersistedSubscriptionState | null;
		try {
			persisted = await this.stateStore.load(record.key);
		} catch (error) {
			this.logger.warn("state_load_failed", {
				subscriptionKey: record.key,
				message: toErrorMessage(error),
			});
			return null;
		}
		if (!persisted) {
			return null;
		}
		if (
			persisted.strategyType !== record.strategy.type ||
			persisted.triggerType !== record.triggerType ||
			!sameParams(persisted.params, record.strategy.params)
		) {
			this.logger.warn("state_discarded", {
				subscriptionKey: record.key,
				persistedStrategyType: persisted.strategyType,
				persistedTriggerType: persisted.triggerType,
			});
			return null;
		}
		this.logger.info("state_restored", {
			subscriptionKey: record.key,
			lastOpenTime: persisted.state.lastOpenTime,
			samples: persisted.state.indicators.samples,
		});
		return persisted.state;
	}

	private async persist(record: SubscriptionRecord, state: SubscriptionState): Promise<void> {
		if (!this.stateStore || record.retired) {
			return;
		}
		try {
			await this.stateStore.save({
				version: 1,
				subscriptionKey: record.key,
				strategyType: record.strategy.type,
				params: { ...record.strategy.params },
				triggerType: record.triggerType,
				state,
				savedAt: this.clock(),
			});
		} catch (error) {
			this.logger.error("state_save_failed", {
				subscriptionKey: record.key,
				message: toErrorMessage(error),
			});
		}
	}

	private async discard(record: SubscriptionRecord): Promise<void> {
		await record.lane.onIdle();
		if (!this.stateStore) {
			return;
		}
		try {
			await this.stateStore.delete(record.key);
		} catch (error) {
			this.logger.error("state_delete_failed", {
				subscriptionKey: record.key,
				message: toErrorMessage(error),
			});
		}
	}

	private track(dispatch: Promise<DispatchOutcome>): Promise<DispatchOutcome> {
		this.inFlight.add(dispatch);
		return dispatch.finally(() => {
			this.inFlight.delete(dispatch);
		});
	}
}
