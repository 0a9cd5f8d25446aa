const QUOTE_ASSETS = ["USDT", "USDC", "FDUSD", "BUSD", "TUSD", "BTC", "ETH", "BNB", "EUR", "TRY"];

/** "btc/usdt" or "BTC_USDT" → "BTCUSDT", the form used in stream names and keys. */
export const collapseSymbol = (symbol: string): string =>
	symbol.trim().replace(/[/:_\-]/g, "").toUpperCase();

/**
 * Unified "BASE/QUOTE" form used by ccxt. Symbols already carrying a
 * separator are split on it; otherwise a known quote suffix is peeled off.
 */
export const toCcxtSymbol = (symbol: string): string => {
	const trimmed = symbol.trim().toUpperCase();
	if (trimmed.includes("/")) {
		return trimmed;
	}
	if (trimmed.includes("_")) {
		const [base, quote] = trimmed.split("_");
		if (base && quote) {
			return `${base}/${quote}`;
		}
	}
	const quote = QUOTE_ASSETS.find(
		(asset) => trimmed.endsWith(asset) && trimmed.length > asset.length
	);
	return quote ? `${trimmed.slice(0, -quote.length)}/${quote}` : trimmed;
};
