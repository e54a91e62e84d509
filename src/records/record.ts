/**
 * Event records: one immutable value per logged occurrence.
 *
 * @module records/record
 */

import type { LogLevel } from '../levels/index.js'
import type { TraceFrame } from '../trace/index.js'
import type { Payload } from './payload.js'

export interface EventRecord {
	readonly payload: Payload
	readonly level: LogLevel
	/** Dotted category such as "db.query" */
	readonly category: string
	/** Seconds since the epoch, sub-millisecond resolution */
	readonly timestamp: number
	readonly trace: readonly TraceFrame[]
}

/**
 * Create a frozen record. The trace array and its frames are frozen too.
 */
export function createRecord(
	payload: Payload,
	level: LogLevel,
	category: string,
	timestamp: number,
	trace: readonly TraceFrame[] = [],
): EventRecord {
	const frozenTrace = Object.freeze(trace.map((frame) => Object.freeze({ ...frame })))
	return Object.freeze({
		payload: Object.freeze(payload),
		level,
		category,
		timestamp,
		trace: frozenTrace,
	})
}
