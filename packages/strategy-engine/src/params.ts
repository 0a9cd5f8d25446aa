import { ConfigurationError } from "@sigflow/core";
import { z } from "zod";
import type { IntParamSpec, StrategyParamDescriptor } from "./types";

export const intParam = (spec: IntParamSpec) =>
	z.number().int().min(spec.min).max(spec.max).default(spec.default);

export const describeParams = (
	specs: Record<string, IntParamSpec>
): StrategyParamDescriptor[] =>
	Object.entries(specs).map(([name, spec]) => ({ name, type: "int", ...spec }));

export const parseParams = <T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	strategyType: string,
	raw: Record<string, unknown>
): T => {
	const result = schema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`)
			.join("; ");
		throw new ConfigurationError(
			`Invalid params for strategy ${strategyType}: ${issues}`,
			{ strategyType }
		);
	}
	return result.data;
};
