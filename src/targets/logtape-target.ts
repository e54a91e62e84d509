/**
 * Target that forwards records to LogTape.
 *
 * Each record is logged under `[...rootCategory, ...category.split(".")]`,
 * so LogTape's hierarchical configuration decides which sinks receive it.
 *
 * @module targets/logtape-target
 */

import { getLogger, type LogLevel as LogTapeLevel } from '@logtape/logtape'
import { DEFAULT_ROOT_CATEGORY } from '../config/defaults.js'
import { getLevelName, LogLevel } from '../levels/index.js'
import { type EventRecord, formatPayload } from '../records/index.js'
import { Target, type TargetOptions } from './target.js'

export interface LogTapeTargetOptions extends TargetOptions {
	/** Category prefix for every forwarded record. Defaults to "app". */
	rootCategory?: string | readonly string[]
}

/**
 * LogTape level a record is forwarded at.
 *
 * Trace and profiling records are debug output.
 */
export function toLogTapeLevel(level: number): LogTapeLevel {
	switch (level) {
		case LogLevel.Error:
			return 'error'
		case LogLevel.Warning:
			return 'warning'
		case LogLevel.Info:
			return 'info'
		default:
			return 'debug'
	}
}

/**
 * Structured properties attached to a forwarded record.
 */
export function toLogProperties(record: EventRecord): Record<string, unknown> {
	const properties: Record<string, unknown> = {
		message: formatPayload(record.payload),
		category: record.category,
		level: getLevelName(record.level),
		timestamp: record.timestamp,
		trace: record.trace,
	}
	if (record.payload.kind === 'error') {
		properties.error = record.payload.error
	} else if (record.payload.kind === 'data') {
		properties.data = record.payload.data
	}
	return properties
}

export class LogTapeTarget extends Target {
	readonly rootCategory: readonly string[]

	constructor(options: LogTapeTargetOptions = {}) {
		super(options)
		const root = options.rootCategory ?? DEFAULT_ROOT_CATEGORY
		this.rootCategory = typeof root === 'string' ? [root] : [...root]
	}

	/**
	 * LogTape category a record is logged under.
	 */
	categoryOf(record: EventRecord): string[] {
		const segments = record.category.split('.').filter((segment) => segment.length > 0)
		return [...this.rootCategory, ...segments]
	}

	protected override export(records: readonly EventRecord[]): void {
		for (const record of records) {
			const logger = getLogger(this.categoryOf(record))
			const properties = toLogProperties(record)

			switch (toLogTapeLevel(record.level)) {
				case 'error':
					logger.error('{message}', properties)
					break
				case 'warning':
					logger.warn('{message}', properties)
					break
				case 'info':
					logger.info('{message}', properties)
					break
				default:
					logger.debug('{message}', properties)
			}
		}
	}
}
