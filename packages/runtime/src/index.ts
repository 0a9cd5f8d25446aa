export * from "./SignalEngine";
export * from "./logger";
export * from "./pipeline/advance";
export * from "./registry/SubscriptionRegistry";
export * from "./evaluator/StrategyEvaluator";
export * from "./evaluator/FailureReporter";
export * from "./sinks/SignalSink";
export * from "./state/types";
export * from "./state/InMemoryStateStore";
export * from "./state/FileStateStore";
export * from "./marketData/binanceKline";
export * from "./marketData/BinanceKlineSource";
export * from "./marketData/symbols";
export * from "./history/CcxtKlineHistory";
