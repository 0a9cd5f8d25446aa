import { ConfigurationError, EngineConfig } from "@sigflow/core";
import { STRATEGY_TYPES } from "@sigflow/strategy-engine";

export type ArgValue = string | boolean;

export interface SignalCliOptions {
	symbols: string[];
	interval: string;
	strategyType: string;
	triggerType: string;
	params: Record<string, unknown>;
	warmupKlines: number;
}

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals.length && args.symbol === undefined) {
		args.symbol = positionals.join(",");
	}
	return args;
};

export const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.trim() ? value.trim() : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const parseParams = (raw: string | undefined): Record<string, unknown> => {
	if (raw === undefined) {
		return {};
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		throw new ConfigurationError(`--params is not valid JSON: ${raw}`);
	}
	if (!isRecord(parsed)) {
		throw new ConfigurationError("--params must be a JSON object");
	}
	return parsed;
};

const parseWarmup = (raw: string | undefined, fallback: number): number => {
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value < 0) {
		throw new ConfigurationError(`Invalid numeric value for --warmup: ${raw}`);
	}
	return value;
};

/**
 * Subscription settings from the command line; the warm-up length falls
 * back to the engine configuration.
 * @throws ConfigurationError when no symbol is given or a value is malformed
 */
export const resolveCliOptions = (
	args: Record<string, ArgValue>,
	config: Pick<EngineConfig, "warmupKlines">
): SignalCliOptions => {
	const symbols = (readString(args, "symbol") ?? "")
		.split(",")
		.map((symbol) => symbol.trim())
		.filter((symbol) => symbol.length > 0);
	if (!symbols.length) {
		throw new ConfigurationError("Missing required --symbol <symbol[,symbol...]>");
	}
	return {
		symbols,
		interval: readString(args, "interval") ?? "1m",
		strategyType:
			readString(args, "strategy") ?? readString(args, "strategyType") ?? STRATEGY_TYPES[0],
		triggerType: readString(args, "trigger") ?? "EACH_KLINE_CLOSE",
		params: parseParams(readString(args, "params")),
		warmupKlines: parseWarmup(readString(args, "warmup"), config.warmupKlines),
	};
};
