/**
 * Structured error types for the monitor.
 *
 * Every failure the monitor raises on its own account carries:
 * - a coarse category used to pick a log level and decide on retries
 * - a machine-readable code
 * - a recoverability hint
 * - context metadata and an optional cause
 *
 * Errors thrown by traced pipeline code are never wrapped in these types;
 * they pass through the tracer unchanged.
 *
 * @module errors/structured-error
 */

/**
 * Error categories used across the monitor.
 */
export type ErrorCategory =
	| 'NETWORK_ERROR' // Alert delivery or remote store unreachable
	| 'VALIDATION' // Rejected input (negative counts, bad thresholds)
	| 'CONFIGURATION' // Config file unreadable or invalid
	| 'PERSISTENCE' // Metrics store write/read failure

/**
 * Base class for categorized monitor errors.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Failed to append latency batch",
 *   "PERSISTENCE",
 *   "STORE_APPEND_FAILED",
 *   true,
 *   { records: 100 },
 * );
 * ```
 */
export class StructuredError extends Error {
	public readonly category: ErrorCategory

	/** Machine-readable error code, e.g. "INVALID_THRESHOLD_ORDER". */
	public readonly code: string

	/** Whether retrying the same operation later may succeed. */
	public readonly recoverable: boolean

	public readonly context: Record<string, unknown>

	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize for structured logging.
	 */
	toJSON(): {
		name: string
		message: string
		category: ErrorCategory
		code: string
		recoverable: boolean
		context: Record<string, unknown>
		stack?: string
		cause?: {
			name: string
			message: string
			stack?: string
		}
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

/**
 * Rejected input: negative throughput counts, unknown stages, malformed SLO
 * threshold ordering. Never recoverable by retrying the same call.
 */
export class ValidationError extends StructuredError {
	constructor(
		message: string,
		code = 'INVALID_INPUT',
		context: Record<string, unknown> = {},
	) {
		super(message, 'VALIDATION', code, false, context)
		this.name = 'ValidationError'
	}
}

/**
 * Configuration that could not be read or did not validate.
 */
export class ConfigurationError extends StructuredError {
	constructor(
		message: string,
		code = 'INVALID_CONFIG',
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, 'CONFIGURATION', code, false, context, cause)
		this.name = 'ConfigurationError'
	}
}

/**
 * Alert sink could not deliver a batch. The next tick may succeed.
 */
export class AlertDeliveryError extends StructuredError {
	constructor(
		message: string,
		code = 'ALERT_DELIVERY_FAILED',
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, 'NETWORK_ERROR', code, true, context, cause)
		this.name = 'AlertDeliveryError'
	}
}

export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * True when the error is a StructuredError marked recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable
}

/**
 * Extract a loggable message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
