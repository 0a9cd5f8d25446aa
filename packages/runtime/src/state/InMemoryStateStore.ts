import type { SubscriptionKey } from "@sigflow/core";
import type { PersistedSubscriptionState, SubscriptionStateStore } from "./types";

/** Keeps snapshots for the lifetime of the process. */
export class InMemoryStateStore implements SubscriptionStateStore {
	private readonly entries = new Map<SubscriptionKey, PersistedSubscriptionState>();

	async load(key: SubscriptionKey): Promise<PersistedSubscriptionState | null> {
		const entry = this.entries.get(key);
		return entry ? structuredClone(entry) : null;
	}

	async save(snapshot: PersistedSubscriptionState): Promise<void> {
		this.entries.set(snapshot.subscriptionKey, structuredClone(snapshot));
	}

	async delete(key: SubscriptionKey): Promise<void> {
		this.entries.delete(key);
	}
}
