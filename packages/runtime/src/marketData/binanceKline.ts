import { KlineEvent, ValidationError, validateKlineEvent } from "@sigflow/core";
import { z } from "zod";

const klinePayloadSchema = z.object({
	e: z.literal("kline"),
	E: z.number(),
	s: z.string(),
	k: z.object({
		t: z.number(),
		T: z.number(),
		s: z.string(),
		i: z.string(),
		o: z.string(),
		c: z.string(),
		h: z.string(),
		l: z.string(),
		v: z.string(),
		x: z.boolean(),
	}),
});

export type BinanceKlinePayload = z.infer<typeof klinePayloadSchema>;

const unwrap = (message: unknown): unknown => {
	if (typeof message === "object" && message !== null && "data" in message) {
		return message.data;
	}
	return message;
};

const isKlineMessage = (payload: unknown): boolean =>
	typeof payload === "object" &&
	payload !== null &&
	"e" in payload &&
	payload.e === "kline";

/**
 * Map a Binance kline stream message (raw or combined-stream envelope) to a
 * KlineEvent. The candle open time `k.t` identifies the candle, the message
 * time `E` stamps the update. Returns null for other event types.
 * @throws ValidationError when a kline message does not match the stream format
 */
export const parseBinanceKlineMessage = (raw: unknown): Readonly<KlineEvent> | null => {
	let message: unknown = raw;
	if (typeof raw === "string") {
		try {
			message = JSON.parse(raw);
		} catch (error) {
			throw new ValidationError("Stream message is not valid JSON", {
				cause: error instanceof Error ? error.message : String(error),
			});
		}
	}

	const payload = unwrap(message);
	if (!isKlineMessage(payload)) {
		return null;
	}
	const parsed = klinePayloadSchema.safeParse(payload);
	if (!parsed.success) {
		throw new ValidationError("Malformed kline message", {
			issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
		});
	}

	const { E, k } = parsed.data;
	return validateKlineEvent({
		symbol: k.s,
		interval: k.i,
		open: Number(k.o),
		high: Number(k.h),
		low: Number(k.l),
		close: Number(k.c),
		volume: Number(k.v),
		openTime: k.t,
		eventTime: E,
		isClosed: k.x,
	});
};
