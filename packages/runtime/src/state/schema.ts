import { TRIGGER_TYPES } from "@sigflow/trigger-engine";
import { z } from "zod";

const nullableNumber = z.number().nullable();

const emaStateSchema = z.object({
	period: z.number().int().positive(),
	count: z.number().int().nonnegative(),
	seedSum: z.number(),
	value: nullableNumber,
});

const linePairSchema = z
	.object({ macdLine: z.number(), signalLine: z.number() })
	.nullable();

const macdStateSchema = z.object({
	params: z.object({
		fast: z.number().int().positive(),
		slow: z.number().int().positive(),
		signal: z.number().int().positive(),
	}),
	fast: emaStateSchema,
	slow: emaStateSchema,
	signal: emaStateSchema,
	previous: linePairSchema,
	current: linePairSchema,
});

const indicatorStatesSchema = z.object({
	close: nullableNumber,
	emas: z.record(emaStateSchema),
	macds: z.record(macdStateSchema),
});

const indicatorSetSchema = z.object({
	spec: z.object({
		ema: z.array(z.number().int().positive()).optional(),
		macd: z
			.array(
				z.object({
					name: z.string(),
					fast: z.number().int().positive(),
					slow: z.number().int().positive(),
					signal: z.number().int().positive(),
				})
			)
			.optional(),
	}),
	samples: z.number().int().nonnegative(),
	base: indicatorStatesSchema,
	current: indicatorStatesSchema,
});

export const persistedStateSchema = z.object({
	version: z.literal(1),
	subscriptionKey: z.string(),
	strategyType: z.string(),
	params: z.record(z.number()),
	triggerType: z.enum(TRIGGER_TYPES),
	state: z.object({
		indicators: indicatorSetSchema,
		trigger: z.object({
			triggerType: z.enum(TRIGGER_TYPES),
			lastFiredAt: nullableNumber,
			lastKlineTime: nullableNumber,
			firedOnce: z.boolean(),
			lastMinuteBucket: nullableNumber,
		}),
		lastOpenTime: nullableNumber,
		lastClosed: z.boolean(),
	}),
	savedAt: z.number(),
});
