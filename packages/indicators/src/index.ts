export * from "./ema";
export * from "./macd";
export * from "./indicatorSet";
