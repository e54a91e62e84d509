/**
 * Structured errors for spanlog.
 *
 * Only configuration problems are ever thrown by the library, and only while
 * a logger, target or level mask is being constructed. Logging, flushing and
 * profiling never throw to the caller: a target failure becomes a
 * `TargetError` that is reported through diagnostics.
 *
 * @module errors/structured-error
 */

/**
 * Error categories used by spanlog.
 */
export type ErrorCategory =
	| 'CONFIGURATION' // Invalid options or level names
	| 'TARGET' // A target failed to collect or export records

/**
 * Structured error with categorization, recoverability, and context.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Target rejected batch",
 *   "TARGET",
 *   "TARGET_EXPORT_FAILED",
 *   true,
 *   { target: "file" },
 * );
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category for classification.
	 */
	public readonly category: ErrorCategory

	/**
	 * Machine-readable error code (e.g., "INVALID_LOGGER_OPTIONS").
	 */
	public readonly code: string

	/**
	 * Whether the failing operation may succeed if retried.
	 */
	public readonly recoverable: boolean

	/**
	 * Arbitrary context metadata for debugging.
	 */
	public readonly context: Record<string, unknown>

	/**
	 * Original error that caused this error.
	 */
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
	 * Serialize error to JSON for logging.
	 *
	 * @returns Plain object with all error properties
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
 * Raised when logger options, target options or level names are invalid.
 */
export class ConfigurationError extends StructuredError {
	constructor(
		message: string,
		code: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, 'CONFIGURATION', code, false, context, cause)
		this.name = 'ConfigurationError'
	}
}

/**
 * A target failed while collecting or exporting a batch. The target is
 * disabled, so the failure is never recoverable.
 */
export class TargetError extends StructuredError {
	constructor(
		message: string,
		code: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, 'TARGET', code, false, context, cause)
		this.name = 'TargetError'
	}
}

/**
 * Type guard to check if an error is a StructuredError.
 *
 * @param error - Value to check
 * @returns True if error is a StructuredError instance
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * Type guard for configuration failures.
 */
export function isConfigurationError(
	error: unknown,
): error is ConfigurationError {
	return error instanceof ConfigurationError
}
