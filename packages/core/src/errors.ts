export type SignalEngineErrorCode =
	| "VALIDATION_ERROR"
	| "CONFIGURATION_ERROR"
	| "CONFLICT_ERROR"
	| "EVALUATION_ERROR"
	| "SINK_ERROR";

export class SignalEngineError extends Error {
	readonly code: SignalEngineErrorCode;
	readonly details: Record<string, unknown>;

	constructor(
		code: SignalEngineErrorCode,
		message: string,
		details: Record<string, unknown> = {},
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
		this.details = details;
	}
}

/** Malformed event, out-of-contract input, or unknown subscription key. */
export class ValidationError extends SignalEngineError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("VALIDATION_ERROR", message, details);
	}
}

/** Unknown trigger type, strategy type, invalid strategy params or engine settings. */
export class ConfigurationError extends SignalEngineError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("CONFIGURATION_ERROR", message, details);
	}
}

export class ConflictError extends SignalEngineError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("CONFLICT_ERROR", message, details);
	}
}

export class EvaluationError extends SignalEngineError {
	constructor(
		message: string,
		details?: Record<string, unknown>,
		cause?: unknown
	) {
		super("EVALUATION_ERROR", message, details, { cause });
	}
}

export class SinkError extends SignalEngineError {
	constructor(
		message: string,
		details?: Record<string, unknown>,
		cause?: unknown
	) {
		super("SINK_ERROR", message, details, { cause });
	}
}

export const isSignalEngineError = (
	value: unknown
): value is SignalEngineError => value instanceof SignalEngineError;

export const toErrorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
