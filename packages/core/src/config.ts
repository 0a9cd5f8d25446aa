import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

import { ConfigurationError } from "./errors";
import { DEFAULT_EXCHANGE } from "./subscriptionKey";

export interface EngineConfig {
	/** Exchange prefix used when a subscribed symbol carries none */
	exchange: string;
	evaluationTimeoutMs: number;
	sinkTimeoutMs: number;
	evaluationConcurrency: number;
	/** Closed klines replayed through the indicators before a key goes live */
	warmupKlines: number;
	/** Directory for persisted subscription state; unset keeps state in memory */
	stateDir?: string;
}

export interface ConfigLoadOptions {
	env?: Record<string, string | undefined>;
	envPath?: string;
}

const EngineEnvSchema = z.object({
	SIGNAL_EXCHANGE: z
		.string()
		.trim()
		.regex(/^[A-Za-z0-9_]+$/, "must be alphanumeric")
		.default(DEFAULT_EXCHANGE)
		.transform((value) => value.toUpperCase()),
	EVALUATION_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
	SINK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
	EVALUATION_CONCURRENCY: z.coerce.number().int().positive().default(16),
	WARMUP_KLINES: z.coerce.number().int().nonnegative().default(280),
	STATE_DIR: z.string().trim().min(1).optional(),
});

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["package-lock.json", ".git"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");

const loadEnvFile = (envPath: string): void => {
	if (envLoaded && loadedEnvPath === envPath) {
		return;
	}
	if (fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
	}
	envLoaded = true;
	loadedEnvPath = envPath;
};

// Empty variables count as unset, so a blank line in .env falls back to the default.
const withoutBlankValues = (
	env: Record<string, string | undefined>
): Record<string, string> => {
	const cleaned: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (typeof value === "string" && value.trim() !== "") {
			cleaned[key] = value;
		}
	}
	return cleaned;
};

/**
 * Resolve engine settings from the environment. When no explicit `env` is
 * given, the workspace `.env` file is loaded into `process.env` first.
 * @throws ConfigurationError listing every invalid variable
 */
export const loadEngineConfig = (
	options: ConfigLoadOptions = {}
): EngineConfig => {
	if (!options.env) {
		loadEnvFile(options.envPath ?? getDefaultEnvPath());
	}
	const parsed = EngineEnvSchema.safeParse(
		withoutBlankValues(options.env ?? process.env)
	);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(issue) => `${issue.path.join(".")}: ${issue.message}`
		);
		throw new ConfigurationError(
			`Invalid engine configuration: ${issues.join("; ")}`,
			{ issues }
		);
	}
	const env = parsed.data;
	return {
		exchange: env.SIGNAL_EXCHANGE,
		evaluationTimeoutMs: env.EVALUATION_TIMEOUT_MS,
		sinkTimeoutMs: env.SINK_TIMEOUT_MS,
		evaluationConcurrency: env.EVALUATION_CONCURRENCY,
		warmupKlines: env.WARMUP_KLINES,
		stateDir: env.STATE_DIR,
	};
};
