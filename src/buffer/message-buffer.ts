/**
 * Message buffer: the live generation of records awaiting a flush.
 *
 * Records are appended by `log()` in emission order. A flush swaps the
 * generation for an empty one before handing the taken batch to the
 * dispatcher, so anything logged while targets run belongs to the next
 * generation.
 *
 * @module buffer/message-buffer
 */

import {
	DEFAULT_CATEGORY,
	DEFAULT_FLUSH_INTERVAL,
	DEFAULT_TRACE_LEVEL,
} from '../config/defaults.js'
import type { Dispatcher } from '../dispatch/types.js'
import type { LogLevel } from '../levels/index.js'
import { describeError, getDiagnosticsLogger } from '../logging/index.js'
import { createRecord, type EventRecord, toPayload } from '../records/index.js'
import { captureTrace, DEFAULT_INTERNAL_PATHS } from '../trace/index.js'
import { type Clock, PROCESS_START_TIME, systemClock } from './clock.js'

export interface MessageBufferOptions {
	/**
	 * Records logged before the buffer flushes itself. 0 or less disables
	 * automatic flushing. Defaults to 1000.
	 */
	flushInterval?: number

	/** Maximum application frames captured per record. Defaults to 10. */
	traceLevel?: number

	/** Path prefixes excluded from captured traces */
	internalPaths?: readonly string[]

	/** Receives flushed batches. Without one, flushed records are dropped. */
	dispatcher?: Dispatcher

	/** Time source in seconds. Defaults to the system clock. */
	clock?: Clock

	/** Reference for `getElapsedTime()`. Defaults to process start. */
	startTime?: number
}

const diagnostics = getDiagnosticsLogger('buffer')

export class MessageBuffer {
	readonly flushInterval: number
	readonly traceLevel: number
	readonly internalPaths: readonly string[]
	readonly startTime: number
	dispatcher: Dispatcher | undefined

	private generation: EventRecord[] = []
	private readonly clock: Clock

	constructor(options: MessageBufferOptions = {}) {
		this.flushInterval = options.flushInterval ?? DEFAULT_FLUSH_INTERVAL
		this.traceLevel = options.traceLevel ?? DEFAULT_TRACE_LEVEL
		this.internalPaths = options.internalPaths ?? DEFAULT_INTERNAL_PATHS
		this.dispatcher = options.dispatcher
		this.clock = options.clock ?? systemClock
		this.startTime = options.startTime ?? PROCESS_START_TIME
	}

	/** Number of records in the current generation */
	get size(): number {
		return this.generation.length
	}

	/** Snapshot of the current generation, in emission order */
	get records(): readonly EventRecord[] {
		return [...this.generation]
	}

	/**
	 * Append a record, flushing once the generation reaches the flush interval.
	 *
	 * @param payload - Text, an Error, a payload variant or any data
	 * @param level - Level the record is logged at
	 * @param category - Dotted category, "application" by default
	 */
	log(payload: unknown, level: LogLevel, category: string = DEFAULT_CATEGORY): void {
		try {
			const timestamp = this.clock()
			const trace = captureTrace({
				traceLevel: this.traceLevel,
				internalPaths: this.internalPaths,
			})
			this.generation.push(
				createRecord(toPayload(payload), level, category, timestamp, trace),
			)
		} catch (error: unknown) {
			diagnostics.error('Failed to record log message', {
				category,
				...describeError(error),
			})
			return
		}

		if (this.flushInterval > 0 && this.generation.length >= this.flushInterval) {
			this.flush()
		}
	}

	/**
	 * Hand the current generation to the dispatcher and start a new one.
	 *
	 * @param final - Whether this is the last flush of the process
	 */
	flush(final = false): void {
		const batch = this.generation
		this.generation = []

		const dispatcher = this.dispatcher
		if (!dispatcher) return

		try {
			dispatcher.dispatch(batch, final)
		} catch (error: unknown) {
			diagnostics.error('Dispatcher failed to handle flushed records', {
				records: batch.length,
				final,
				...describeError(error),
			})
		}
	}

	/**
	 * Seconds elapsed since `startTime`.
	 */
	getElapsedTime(): number {
		return this.clock() - this.startTime
	}
}
