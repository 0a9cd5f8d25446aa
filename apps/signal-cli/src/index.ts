#!/usr/bin/env node

import process from "node:process";
import {
	EngineConfig,
	createLogger,
	isSignalEngineError,
	loadEngineConfig,
	parseSubscriptionKey,
	toErrorMessage,
} from "@sigflow/core";
import {
	BinanceKlineSource,
	CcxtKlineHistory,
	FileStateStore,
	LoggingSignalSink,
	SignalEngine,
	collapseSymbol,
} from "@sigflow/runtime";
import { STRATEGY_TYPES } from "@sigflow/strategy-engine";
import { TRIGGER_TYPES } from "@sigflow/trigger-engine";
import { parseCliArgs, readString, resolveCliOptions } from "./cliArgs";

const logger = createLogger("signal-cli");

const USAGE = `Usage:
  npm run signal-cli -- --symbol <symbol[,symbol...]> [options]

Options:
  --symbol <list>          Comma separated symbols, e.g. BTCUSDT,ETHUSDT (required)
  --interval <tf>          Kline interval, "1m" or "60" style (default 1m)
  --strategy <type>        One of ${STRATEGY_TYPES.join(", ")} (default ${STRATEGY_TYPES[0]})
  --trigger <type>         One of ${TRIGGER_TYPES.join(", ")} (default EACH_KLINE_CLOSE)
  --params <json>          Strategy parameters as a JSON object
  --warmup <count>         Closed klines replayed before going live (default WARMUP_KLINES)
  --envPath <path>         Custom .env path
  --listStrategies         Print the strategy catalog and exit
  --help                   Show this message
`;

const main = async (): Promise<void> => {
	const argMap = parseCliArgs(process.argv.slice(2));
	if (argMap.help) {
		console.log(USAGE);
		return;
	}

	const config = loadEngineConfig({ envPath: readString(argMap, "envPath") });
	const history = CcxtKlineHistory.binance();
	const createEngine = (settings: EngineConfig): SignalEngine =>
		new SignalEngine({
			sink: new LoggingSignalSink(),
			settings,
			stateStore: settings.stateDir ? new FileStateStore(settings.stateDir) : undefined,
			history,
		});

	if (argMap.listStrategies) {
		console.log(JSON.stringify(createEngine(config).strategies(), null, 2));
		return;
	}

	const options = resolveCliOptions(argMap, config);
	const engine = createEngine({ ...config, warmupKlines: options.warmupKlines });
	const symbols = options.symbols.map(collapseSymbol);
	const keys = symbols.map((symbol) =>
		engine.subscribe(
			symbol,
			options.interval,
			options.strategyType,
			options.triggerType,
			options.params
		)
	);

	if (options.warmupKlines > 0) {
		for (const key of keys) {
			const klines = await history.fetchClosedKlines(
				parseSubscriptionKey(key),
				options.warmupKlines
			);
			const result = await engine.warmup(key, klines);
			logger.info("warmup_completed", { subscriptionKey: key, ...result });
		}
	}

	const source = new BinanceKlineSource({
		streams: symbols.map((symbol) => ({ symbol, interval: options.interval })),
		onKline: async (event) => {
			await engine.ingest(event);
		},
	});
	source.start();
	logger.info("signal_cli_started", { subscriptions: keys, url: source.url });

	process.once("SIGINT", () => {
		logger.info("signal_cli_stopping", { subscriptions: keys.length });
		source.stop();
		engine.stop().then(
			() => {
				process.exitCode = 0;
			},
			(error: unknown) => {
				logger.error("signal_cli_stop_failed", { message: toErrorMessage(error) });
				process.exitCode = 1;
			}
		);
	});
};

main().catch((error: unknown) => {
	const code = isSignalEngineError(error) ? ` [${error.code}]` : "";
	console.error(`Signal CLI failed${code}:`, toErrorMessage(error));
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
