import fs from "node:fs";
import path from "node:path";
import { SubscriptionKey, ValidationError } from "@sigflow/core";
import { persistedStateSchema } from "./schema";
import type { PersistedSubscriptionState, SubscriptionStateStore } from "./types";

/**
 * One JSON file per subscription key under `dir`. Writes go to a temp file
 * first and are renamed into place.
 */
export class FileStateStore implements SubscriptionStateStore {
	constructor(private readonly dir: string) {}

	async load(key: SubscriptionKey): Promise<PersistedSubscriptionState | null> {
		let raw: string;
		try {
			raw = await fs.promises.readFile(this.fileFor(key), "utf8");
		} catch (error) {
			if (isMissingFile(error)) {
				return null;
			}
			throw error;
		}

		const parsed = persistedStateSchema.safeParse(JSON.parse(raw));
		if (!parsed.success || parsed.data.subscriptionKey !== key) {
			throw new ValidationError(`Persisted state for ${key} is invalid`, {
				subscriptionKey: key,
				file: this.fileFor(key),
			});
		}
		return parsed.data;
	}

	async save(snapshot: PersistedSubscriptionState): Promise<void> {
		await fs.promises.mkdir(this.dir, { recursive: true });
		const target = this.fileFor(snapshot.subscriptionKey);
		const temp = `${target}.tmp`;
		await fs.promises.writeFile(temp, JSON.stringify(snapshot), "utf8");
		await fs.promises.rename(temp, target);
	}

	async delete(key: SubscriptionKey): Promise<void> {
		await fs.promises.rm(this.fileFor(key), { force: true });
	}

	fileFor(key: SubscriptionKey): string {
		return path.join(this.dir, `${encodeURIComponent(key)}.json`);
	}
}

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";
