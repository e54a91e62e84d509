/**
 * Logger options validated with Zod.
 *
 * Only the serializable part of a logger's options lives here, so the same
 * schema validates options passed in code and options read from a JSON file.
 *
 * @module config/options
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { ConfigurationError } from '../errors/index.js'
import { DEFAULT_INTERNAL_PATHS } from '../trace/index.js'
import {
	DEFAULT_DB_CATEGORIES,
	DEFAULT_FLUSH_INTERVAL,
	DEFAULT_TRACE_LEVEL,
} from './defaults.js'

export const LoggerOptionsSchema = z
	.object({
		/** 0 or less disables automatic flushing */
		flushInterval: z.number().int().default(DEFAULT_FLUSH_INTERVAL),
		traceLevel: z.number().int().min(0).default(DEFAULT_TRACE_LEVEL),
		internalPaths: z.array(z.string().min(1)).default([...DEFAULT_INTERNAL_PATHS]),
		dbCategories: z.array(z.string().min(1)).default([...DEFAULT_DB_CATEGORIES]),
	})
	.strict()

/** Options as accepted, every field optional */
export type LoggerConfigInput = z.input<typeof LoggerOptionsSchema>

/** Options with defaults applied */
export type LoggerConfig = z.output<typeof LoggerOptionsSchema>

/**
 * Validate logger options and apply defaults.
 *
 * @throws ConfigurationError with code `INVALID_LOGGER_OPTIONS`; the Zod
 * issues are in its context
 *
 * @example
 * ```typescript
 * parseLoggerOptions({ flushInterval: 0 })
 * // { flushInterval: 0, traceLevel: 10, internalPaths: [...], dbCategories: ["db.query", "db.execute"] }
 * ```
 */
export function parseLoggerOptions(input: unknown = {}): LoggerConfig {
	const result = LoggerOptionsSchema.safeParse(input)
	if (!result.success) {
		throw new ConfigurationError('Invalid logger options', 'INVALID_LOGGER_OPTIONS', {
			issues: result.error.issues.map((issue) => ({
				path: issue.path.join('.'),
				message: issue.message,
			})),
		})
	}
	return result.data
}

/**
 * Read logger options from a JSON file and validate them.
 *
 * @throws ConfigurationError with code `UNREADABLE_LOGGER_CONFIG` when the
 * file cannot be read or parsed, `INVALID_LOGGER_OPTIONS` when it does not
 * validate
 */
export function loadLoggerConfig(filePath: string): LoggerConfig {
	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(filePath, 'utf8'))
	} catch (error: unknown) {
		throw new ConfigurationError(
			`Cannot read logger config from ${filePath}`,
			'UNREADABLE_LOGGER_CONFIG',
			{ path: filePath },
			error instanceof Error ? error : undefined,
		)
	}
	return parseLoggerOptions(raw)
}
