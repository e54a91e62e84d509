/**
 * LogTape loggers for spanlog's own diagnostics.
 *
 * Failures the library absorbs (a throwing dispatcher, a target that cannot
 * export, an exit hook that throws) are reported here instead of being
 * raised to the caller. Nothing is emitted unless the host application
 * configures LogTape for the `spanlog` category.
 *
 * @example
 * ```typescript
 * import { configure, getConsoleSink } from "@logtape/logtape";
 *
 * await configure({
 *   sinks: { console: getConsoleSink() },
 *   loggers: [{ category: ["spanlog"], sinks: ["console"], lowestLevel: "warning" }],
 * });
 * ```
 */

import { getLogger, type Logger } from '@logtape/logtape'
import { DIAGNOSTICS_CATEGORY } from '../config/defaults.js'
import { isStructuredError } from '../errors/index.js'

/** Subsystems that report diagnostics */
export type DiagnosticsSubsystem = 'buffer' | 'dispatcher' | 'shutdown'

/**
 * Get the diagnostics logger for a subsystem.
 *
 * @returns Logger for ["spanlog", subsystem]
 */
export function getDiagnosticsLogger(subsystem: DiagnosticsSubsystem): Logger {
	return getLogger([DIAGNOSTICS_CATEGORY, subsystem])
}

/**
 * Properties describing a caught error, for structured diagnostics.
 *
 * Structured errors contribute their category, code, recoverability and
 * context; `cause` is the message of the underlying error.
 */
export function describeError(error: unknown): Record<string, unknown> {
	if (isStructuredError(error)) {
		const { name, message, stack, cause, ...details } = error.toJSON()
		return { error: message, errorName: name, ...details, cause: cause?.message, stack }
	}
	if (error instanceof Error) {
		return { error: error.message, errorName: error.name, stack: error.stack }
	}
	return { error: String(error) }
}
