import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "@sigflow/core";
import { FileStateStore } from "./FileStateStore";
import { createSubscriptionState } from "../pipeline/advance";
import type { PersistedSubscriptionState } from "./types";

const KEY = "BINANCE:BTCUSDT@KLINE_60";

const snapshot = (): PersistedSubscriptionState => ({
	version: 1,
	subscriptionKey: KEY,
	strategyType: "macd_cross",
	params: { fast: 12, slow: 26, signal: 9 },
	triggerType: "EACH_KLINE_CLOSE",
	state: {
		...createSubscriptionState(
			{ ema: [3], macd: [{ name: "macd", fast: 12, slow: 26, signal: 9 }] },
			"EACH_KLINE_CLOSE"
		),
		lastOpenTime: 3_600_000,
		lastClosed: true,
	},
	savedAt: 99,
});

describe("FileStateStore", () => {
	let dir: string;
	let store: FileStateStore;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "sigflow-state-"));
		store = new FileStateStore(path.join(dir, "nested"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("returns null for keys never saved", async () => {
		expect(await store.load(KEY)).toBeNull();
	});

	it("reads back what it saved", async () => {
		await store.save(snapshot());

		expect(await store.load(KEY)).toEqual(snapshot());
		expect(path.basename(store.fileFor(KEY))).toBe(
			"BINANCE%3ABTCUSDT%40KLINE_60.json"
		);
	});

	it("deletes saved state", async () => {
		await store.save(snapshot());
		await store.delete(KEY);
		await store.delete(KEY);

		expect(await store.load(KEY)).toBeNull();
	});

	it("rejects files that do not hold subscription state", async () => {
		await store.save(snapshot());
		fs.writeFileSync(store.fileFor(KEY), JSON.stringify({ version: 2 }));

		await expect(store.load(KEY)).rejects.toThrow(ValidationError);
	});
});
