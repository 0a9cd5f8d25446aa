import PQueue from "p-queue";
import {
	ConflictError,
	ParsedSubscriptionKey,
	SubscriptionKey,
	ValidationError,
	parseSubscriptionKey,
} from "@sigflow/core";
import type { Strategy } from "@sigflow/strategy-engine";
import type { TriggerType } from "@sigflow/trigger-engine";
import type { SubscriptionState } from "../state/types";

export interface SubscriptionRecord {
	readonly key: SubscriptionKey;
	readonly parsed: ParsedSubscriptionKey;
	readonly strategy: Strategy;
	readonly triggerType: TriggerType;
	/** Single writer for this key; one task at a time. */
	readonly lane: PQueue;
	/** Null until the first event (or warm-up) reaches the key. */
	state: SubscriptionState | null;
	retired: boolean;
	registeredAt: number;
}

export interface SubscriptionSnapshot {
	key: SubscriptionKey;
	strategyType: string;
	params: Record<string, number>;
	triggerType: TriggerType;
	pending: number;
	state: SubscriptionState | null;
}

export interface RegisterResult {
	record: SubscriptionRecord;
	created: boolean;
}

export const sameParams = (
	left: Readonly<Record<string, number>>,
	right: Readonly<Record<string, number>>
): boolean => {
	const leftKeys = Object.keys(left).sort();
	const rightKeys = Object.keys(right).sort();
	return (
		leftKeys.length === rightKeys.length &&
		leftKeys.every((name, index) => name === rightKeys[index] && left[name] === right[name])
	);
};

/**
 * Key → subscription record. Records are only written from their own lane;
 * there is no lock across keys.
 */
export class SubscriptionRegistry {
	private readonly records = new Map<SubscriptionKey, SubscriptionRecord>();

	constructor(private readonly clock: () => number = Date.now) {}

	register(
		key: SubscriptionKey,
		strategy: Strategy,
		triggerType: TriggerType
	): RegisterResult {
		const existing = this.records.get(key);
		if (existing) {
			if (
				existing.strategy.type === strategy.type &&
				existing.triggerType === triggerType &&
				sameParams(existing.strategy.params, strategy.params)
			) {
				return { record: existing, created: false };
			}
			throw new ConflictError(
				`Subscription ${key} is already registered with different parameters`,
				{
					subscriptionKey: key,
					existing: {
						strategyType: existing.strategy.type,
						params: { ...existing.strategy.params },
						triggerType: existing.triggerType,
					},
					requested: {
						strategyType: strategy.type,
						params: { ...strategy.params },
						triggerType,
					},
				}
			);
		}

		const record: SubscriptionRecord = {
			key,
			parsed: parseSubscriptionKey(key),
			strategy,
			triggerType,
			lane: new PQueue({ concurrency: 1 }),
			state: null,
			retired: false,
			registeredAt: this.clock(),
		};
		this.records.set(key, record);
		return { record, created: true };
	}

	/**
	 * Removes the key. Work already running on the lane finishes against the
	 * retired record; queued work sees `retired` and does nothing.
	 */
	unregister(key: SubscriptionKey): SubscriptionRecord | null {
		const record = this.records.get(key);
		if (!record) {
			return null;
		}
		record.retired = true;
		this.records.delete(key);
		return record;
	}

	get(key: SubscriptionKey): SubscriptionRecord {
		const record = this.records.get(key);
		if (!record) {
			throw new ValidationError(`unknown subscription: ${key}`, {
				subscriptionKey: key,
			});
		}
		return record;
	}

	keys(): SubscriptionKey[] {
		return [...this.records.keys()];
	}

	get size(): number {
		return this.records.size;
	}

	list(): SubscriptionRecord[] {
		return [...this.records.values()];
	}

	/** Deep copies of every record's committed state; never waits on lanes. */
	snapshot(): SubscriptionSnapshot[] {
		return [...this.records.values()].map((record) => ({
			key: record.key,
			strategyType: record.strategy.type,
			params: { ...record.strategy.params },
			triggerType: record.triggerType,
			pending: record.lane.size + record.lane.pending,
			state: record.state ? structuredClone(record.state) : null,
		}));
	}
}
